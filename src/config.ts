import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { parse as parseYaml } from 'yaml';
import type { AuditSettings } from './audit.js';
import { createSeed } from './element/mutable.js';
import { ConfigError } from './errors.js';
import { Severity } from './types.js';

export const ConfigSchema = Type.Object(
  {
    excludeCookies: Type.Optional(Type.Array(Type.String())),
    auditCookiesExtensively: Type.Optional(Type.Boolean()),
    paramFlip: Type.Optional(Type.Boolean()),
    seed: Type.Optional(Type.String({ minLength: 1 })),
    format: Type.Optional(Type.Union([Type.Literal('terminal'), Type.Literal('json'), Type.Literal('sarif')])),
    severity: Type.Optional(Type.Enum(Severity)),
    timeout: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export type CookieProbeConfig = Static<typeof ConfigSchema>;

export const CONFIG_FILES = ['.cookieprobe.yml', '.cookieprobe.yaml', '.cookieproberc.yml'];

export function parseConfig(raw: string, path = '<inline>'): CookieProbeConfig {
  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (e) {
    throw new ConfigError(path, 'invalid YAML', { cause: e });
  }
  if (data === null || data === undefined) return {};

  if (!Value.Check(ConfigSchema, data)) {
    const [first] = [...Value.Errors(ConfigSchema, data)];
    const where = first?.path || '/';
    throw new ConfigError(path, `${where}: ${first?.message ?? 'does not match the schema'}`);
  }
  return data;
}

/** Reads the first config file found in `dir`; no file means an empty config. */
export function loadConfig(dir: string): CookieProbeConfig {
  for (const name of CONFIG_FILES) {
    const p = join(dir, name);
    if (existsSync(p)) return parseConfig(readFileSync(p, 'utf-8'), p);
  }
  return {};
}

export function resolveSettings(config: CookieProbeConfig, overrides: Partial<AuditSettings> = {}): AuditSettings {
  return {
    excludeCookies: overrides.excludeCookies ?? config.excludeCookies ?? [],
    auditCookiesExtensively: overrides.auditCookiesExtensively ?? config.auditCookiesExtensively ?? false,
    paramFlip: overrides.paramFlip ?? config.paramFlip ?? false,
    seed: overrides.seed ?? config.seed ?? createSeed(),
  };
}

export const CONFIG_TEMPLATE = `# cookieprobe configuration
format: terminal          # Output: terminal, json, sarif
severity: low             # Minimum finding severity: critical, high, medium, low, info
timeout: 10000            # Request timeout (ms)

# Cookies that are never audited
excludeCookies: []

# Add a variant that carries the payload as the cookie name
paramFlip: false

# Also send every cookie variant with the page's links and forms
auditCookiesExtensively: false

# Value used for flipped cookies (random per run when unset)
# seed: cookieprobe
`;
