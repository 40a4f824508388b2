import { expiresToTime } from './timestamp.js';

/*
Resources:
 https://datatracker.ietf.org/doc/html/rfc2965#section-3.2.2
 https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Set-Cookie
*/

export const ATTRIBUTE_NAMES = [
  'name',
  'value',
  'version',
  'port',
  'discard',
  'comment_url',
  'expires',
  'max_age',
  'comment',
  'secure',
  'path',
  'domain',
  'httponly',
] as const;

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

export interface AttributeSet {
  name: string | null;
  value: string | null;
  version: number;
  port: string | null;
  discard: boolean | null;
  comment_url: string | null;
  expires: Date | null;
  max_age: number | null;
  comment: string | null;
  secure: boolean | null;
  path: string | null;
  domain: string | null;
  httponly: boolean;
}

export type AttributeValue = AttributeSet[AttributeName];

export type RawValue = string | number | boolean | Date | null | undefined;

/** Attribute input as produced by the parsers or given by hand; unknown keys are allowed. */
export type RawAttributes = Record<string, RawValue>;

export const DEFAULT_ATTRIBUTES: Readonly<AttributeSet> = Object.freeze({
  name: null,
  value: null,
  version: 0,
  port: null,
  discard: null,
  comment_url: null,
  expires: null,
  max_age: null,
  comment: null,
  secure: null,
  path: null,
  domain: null,
  httponly: false,
});

const NAMES: ReadonlySet<string> = new Set(ATTRIBUTE_NAMES);

export function isAttributeName(name: string): name is AttributeName {
  return NAMES.has(name);
}

function toText(value: RawValue): string | null | undefined {
  if (value === undefined || value === null) return value;
  if (value instanceof Date) return value.toUTCString();
  return String(value);
}

function toInteger(value: RawValue): number | null | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : undefined;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return parseInt(value, 10);
  return undefined;
}

function toFlag(value: RawValue): boolean | null | undefined {
  if (value === undefined || value === null || typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    if (/^true$/i.test(value)) return true;
    if (/^false$/i.test(value)) return false;
  }
  return undefined;
}

function toTime(value: RawValue): Date | null | undefined {
  if (value === undefined || value === null) return value;
  if (typeof value === 'boolean') return undefined;
  return expiresToTime(value);
}

function nonNull<T>(value: T | null | undefined): T | undefined {
  return value === null ? undefined : value;
}

// undefined means "keep the default"
const COERCE: { [K in AttributeName]: (value: RawValue) => AttributeSet[K] | undefined } = {
  name: toText,
  value: toText,
  version: (value) => nonNull(toInteger(value)),
  port: toText,
  discard: toFlag,
  comment_url: toText,
  expires: toTime,
  max_age: toInteger,
  comment: toText,
  secure: toFlag,
  path: toText,
  domain: toText,
  httponly: (value) => nonNull(toFlag(value)),
};

function coerceInto<K extends AttributeName>(attributes: AttributeSet, key: K, raw: RawValue): void {
  const value = COERCE[key](raw);
  if (value !== undefined) attributes[key] = value;
}

/**
 * Merges raw attributes over {@link DEFAULT_ATTRIBUTES}. Keys outside the
 * fixed set are dropped; an `expires` given as text goes through the
 * timestamp parser.
 */
export function mergeAttributes(raw: RawAttributes): AttributeSet {
  const attributes: AttributeSet = { ...DEFAULT_ATTRIBUTES };
  for (const name of ATTRIBUTE_NAMES) {
    if (Object.prototype.hasOwnProperty.call(raw, name)) coerceInto(attributes, name, raw[name]);
  }
  return attributes;
}

export function cloneAttributes(attributes: Readonly<AttributeSet>): AttributeSet {
  return {
    ...attributes,
    expires: attributes.expires ? new Date(attributes.expires.getTime()) : null,
  };
}
