#!/usr/bin/env node

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { relative, resolve } from 'node:path';
import chalk from 'chalk';
import { Command, Option } from 'commander';
import { glob } from 'glob';
import { auditCookie } from './audit.js';
import { CONFIG_TEMPLATE, loadConfig, resolveSettings, type CookieProbeConfig } from './config.js';
import { fromResponse } from './element/cookie/extract.js';
import { parseCookiejarEntries } from './element/cookie/jar.js';
import { parseSetCookie, parseSetCookies } from './element/cookie/set-cookie.js';
import { pageFromResponse } from './element/page.js';
import { FetchTransport } from './http/transport.js';
import { createTerminalLogger, errorDetails, type Logger } from './logger.js';
import { reportCookies, reportMutations } from './reporter/cookies.js';
import { reportJSON } from './reporter/json.js';
import { reportSARIF } from './reporter/sarif.js';
import { reportTerminal } from './reporter/terminal.js';
import { CookieInspector, type InspectTarget } from './scanner/inspect.js';
import { cookieRules } from './scanner/rules/cookie.js';
import { Severity, type InspectionResult, type OutputFormat } from './types.js';

const VERSION = '0.1.0';

interface OutputOptions {
  format?: OutputFormat;
  severity?: Severity;
  quiet?: boolean;
  verbose?: boolean;
}

interface UrlOptions extends OutputOptions {
  url: string;
}

interface MutateOptions extends OutputOptions {
  paramFlip?: boolean;
  seed?: string;
  strategy?: string[];
}

interface AuditOptions extends OutputOptions {
  payload: string;
  paramFlip?: boolean;
  extensive?: boolean;
  exclude?: string[];
  seed?: string;
}

const formatOption = () =>
  new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json', 'sarif']);
const severityOption = () =>
  new Option('-s, --severity <severity>', 'Minimum severity to report').choices(Object.values(Severity));

function withOutputOptions(command: Command): Command {
  return command
    .addOption(formatOption())
    .addOption(severityOption())
    .option('-q, --quiet', 'Quiet mode — only exit code')
    .option('-v, --verbose', 'Show debug output');
}

// Config file first, CLI flags take precedence
function setup(options: OutputOptions): { config: CookieProbeConfig; logger: Logger; format: OutputFormat } {
  const logger = createTerminalLogger({ quiet: options.quiet, verbose: options.verbose });
  const config = loadConfig(process.cwd());
  return { config, logger, format: options.format ?? config.format ?? 'terminal' };
}

function fail(logger: Logger, err: unknown): void {
  const { message, details } = errorDetails(err);
  logger.error(message, details);
  process.exitCode = 2;
}

function report(result: InspectionResult, format: OutputFormat): void {
  switch (format) {
    case 'json':
      reportJSON(result);
      break;
    case 'sarif':
      reportSARIF(result, VERSION);
      break;
    default:
      reportTerminal(result);
  }
}

function inspectAndReport(targets: InspectTarget[], options: OutputOptions, config: CookieProbeConfig, format: OutputFormat): void {
  const inspector = new CookieInspector();
  inspector.setMinSeverity(options.severity ?? config.severity ?? Severity.Low);
  const result = inspector.inspect(targets);

  if (!options.quiet) {
    if (format === 'terminal') reportCookies(targets.map((t) => t.cookie), format);
    report(result, format);
  }

  // Exit with error code if critical/high findings
  if (result.findings.some((f) => f.severity === Severity.Critical || f.severity === Severity.High)) {
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('cookieprobe')
  .description('Cookie parsing, hygiene checks and mutation for web-application security scans')
  .version(VERSION);

withOutputOptions(
  program
    .command('jar')
    .description('Parse Netscape cookiejar files (glob patterns allowed)')
    .argument('<files...>', 'Cookiejar files')
    .requiredOption('-u, --url <url>', 'Owner URL of the cookies')
).action(async (patterns: string[], options: UrlOptions) => {
  const { config, logger, format } = setup(options);
  try {
    const files = (await Promise.all(patterns.map((p) => glob(p, { nodir: true, absolute: true })))).flat().sort();
    if (files.length === 0) {
      logger.warn(`No cookiejar files match ${patterns.join(', ')}`);
      return;
    }

    const targets: InspectTarget[] = [];
    for (const file of files) {
      const entries = parseCookiejarEntries(options.url, readFileSync(file, 'utf-8'));
      const source = relative(process.cwd(), file);
      for (const entry of entries) {
        if (entry.shifted) logger.debug(`${source}:${entry.line} has no expiry column`);
        targets.push({ source, line: entry.line, cookie: entry.cookie });
      }
    }
    inspectAndReport(targets, options, config, format);
  } catch (err) {
    fail(logger, err);
  }
});

withOutputOptions(
  program
    .command('parse')
    .description('Parse Set-Cookie strings')
    .argument('<set-cookie...>', 'Set-Cookie header values')
    .requiredOption('-u, --url <url>', 'Owner URL of the cookies')
).action((strings: string[], options: UrlOptions) => {
  const { config, logger, format } = setup(options);
  try {
    const result = parseSetCookies(options.url, strings);
    if (!result.ok) {
      fail(logger, result.error);
      return;
    }
    inspectAndReport(
      result.value.map((cookie) => ({ source: options.url, line: 0, cookie })),
      options,
      config,
      format
    );
  } catch (err) {
    fail(logger, err);
  }
});

withOutputOptions(
  program
    .command('fetch')
    .description('Request a URL and list the cookies it sets (headers and meta tags)')
    .argument('<url>', 'URL to request')
).action(async (url: string, options: OutputOptions) => {
  const { config, logger, format } = setup(options);
  try {
    const transport = new FetchTransport({ timeout: config.timeout });
    const response = await transport.get(url, { params: {}, cookies: {}, headers: {} });
    logger.debug(`${response.status} ${response.url}`);
    const cookies = fromResponse(response);
    inspectAndReport(
      cookies.map((cookie) => ({ source: response.url, line: 0, cookie })),
      options,
      config,
      format
    );
  } catch (err) {
    fail(logger, err);
  }
});

withOutputOptions(
  program
    .command('mutate')
    .description('List the variants of a cookie for a payload')
    .argument('<url>', 'Owner URL')
    .argument('<cookie>', 'Cookie as a Set-Cookie string, e.g. "session=abc; Path=/"')
    .argument('<payload>', 'Payload to inject')
    .option('--param-flip', 'Add a variant with the payload as the cookie name')
    .option('--seed <seed>', 'Value for the flipped cookie')
    .option('--strategy <ids...>', 'Restrict the baseline strategies (replace, append)')
).action((url: string, raw: string, payload: string, options: MutateOptions) => {
  const { config, logger, format } = setup(options);
  try {
    const [cookie] = parseSetCookie(url, raw);
    if (!cookie) {
      logger.error(`No cookie in ${JSON.stringify(raw)}`);
      process.exitCode = 2;
      return;
    }
    const settings = resolveSettings(config, { paramFlip: options.paramFlip, seed: options.seed });
    const mutations = cookie.mutations(payload, {
      paramFlip: settings.paramFlip,
      seed: settings.seed,
      strategies: options.strategy,
    });
    if (!options.quiet) reportMutations(mutations, format);
  } catch (err) {
    fail(logger, err);
  }
});

withOutputOptions(
  program
    .command('audit')
    .description('Request a URL and send payload variants of every cookie it sets')
    .argument('<url>', 'URL to audit')
    .requiredOption('-p, --payload <payload>', 'Payload to inject')
    .option('--param-flip', 'Add a variant with the payload as the cookie name')
    .option('--extensive', "Also send every variant with the page's links and forms")
    .option('--exclude <names...>', 'Cookie names to skip')
    .option('--seed <seed>', 'Value for the flipped cookie')
).action(async (url: string, options: AuditOptions) => {
  const { config, logger, format } = setup(options);
  try {
    const settings = resolveSettings(config, {
      paramFlip: options.paramFlip,
      auditCookiesExtensively: options.extensive,
      excludeCookies: options.exclude,
      seed: options.seed,
    });
    const transport = new FetchTransport({ timeout: config.timeout });
    const response = await transport.get(url, { params: {}, cookies: {}, headers: {} });
    const page = pageFromResponse(response);
    const cookies = fromResponse(response);
    if (cookies.length === 0) {
      logger.info(`${response.url} sets no cookies`);
      return;
    }

    for (const cookie of cookies) {
      cookie.auditor = { page, logger };
      const outcome = await auditCookie(cookie, options.payload, { settings, transport, logger });
      if (outcome.skipped) continue;

      if (!options.quiet) reportMutations(outcome.mutations, format);
      if (format === 'terminal' && !options.quiet) {
        const statuses = outcome.responses.map((r) => r.status).join(', ');
        const failed = outcome.failures.length > 0 ? chalk.red(`, ${outcome.failures.length} failed`) : '';
        console.log(chalk.gray(`    ${cookie.name}: ${outcome.requests.length} request(s), status ${statuses}`) + failed);
      }
      if (outcome.failures.length > 0) process.exitCode = 2;
    }
  } catch (err) {
    fail(logger, err);
  }
});

program
  .command('init')
  .description('Create a .cookieprobe.yml configuration file')
  .option('--force', 'Overwrite an existing file')
  .action((options: { force?: boolean }) => {
    const target = resolve('.cookieprobe.yml');
    if (existsSync(target) && !options.force) {
      console.error('⚠️  .cookieprobe.yml already exists (use --force to overwrite)');
      process.exitCode = 1;
      return;
    }
    writeFileSync(target, CONFIG_TEMPLATE);
    console.log('✅ Created .cookieprobe.yml');
  });

program
  .command('rules')
  .description('List the cookie hygiene rules')
  .action(() => {
    console.log(chalk.bold(`\n📋 Cookie Rules (${cookieRules.length} total)\n`));
    for (const r of cookieRules) {
      const sev =
        r.severity === Severity.Critical || r.severity === Severity.High
          ? chalk.red(r.severity.toUpperCase())
          : r.severity === Severity.Medium
            ? chalk.yellow('MED ')
            : r.severity === Severity.Low
              ? chalk.blue('LOW ')
              : chalk.gray('INFO');
      const cwe = r.cwe ? chalk.cyan(r.cwe) : '';
      console.log(`    ${sev}  ${r.id}  ${cwe}`);
      console.log(chalk.gray(`          ${r.message}`));
    }
    console.log();
  });

program.parseAsync().catch((err: unknown) => {
  const { message } = errorDetails(err);
  console.error(chalk.red(`❌ ${message}`));
  process.exitCode = 2;
});
