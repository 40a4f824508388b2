import { SetCookieParseError, isSetCookieParseError } from '../../errors.js';
import { fail, ok, type Result } from '../../types.js';
import type { RawAttributes } from './attributes.js';
import { decode } from './codec.js';
import { Cookie } from './cookie.js';
import { expiresToTime } from './timestamp.js';

// A comma starts a new cookie only when a `name=` follows before any `;`,
// so the comma in `Expires=Thu, 01 Jan 1970 ...` stays put.
const COOKIE_SEPARATOR = /,(?=[^;,]*=)|,$/;
const INTEGER = /^[+-]?\d+$/;

function isQuoted(str: string, quote = '"'): boolean {
  return str.length >= 2 && str[0] === quote && str[str.length - 1] === quote;
}

function dequote(str: string): string {
  return isQuoted(str) ? str.slice(1, -1).replace(/\\(.)/g, '$1') : str;
}

function toInteger(input: string, attribute: string, value: string | undefined): number {
  if (value === undefined || !INTEGER.test(value)) {
    throw new SetCookieParseError(input, `${attribute} must be an integer`);
  }
  return parseInt(value, 10);
}

function parseOne(url: string, input: string): Cookie {
  const [first, ...segments] = input.split(';');
  const pair = first.trim();
  const separator = pair.indexOf('=');
  if (separator < 0) throw new SetCookieParseError(input, 'missing "=" in the name/value pair');

  const attributes: RawAttributes = {
    name: decode(dequote(pair.slice(0, separator).trim())),
    value: decode(dequote(pair.slice(separator + 1).trim())),
  };

  for (const segment of segments) {
    const part = segment.trim();
    if (!part) continue;
    const equals = part.indexOf('=');
    const key = (equals < 0 ? part : part.slice(0, equals)).trim().toLowerCase();
    const value = equals < 0 ? undefined : dequote(part.slice(equals + 1).trim());

    switch (key) {
      case 'path':
        attributes.path = value ?? null;
        break;
      case 'domain':
        attributes.domain = value ?? null;
        break;
      case 'expires':
        attributes.expires = value === undefined ? null : expiresToTime(value);
        break;
      case 'max-age':
        attributes.max_age = toInteger(input, 'Max-Age', value);
        break;
      case 'version':
        attributes.version = toInteger(input, 'Version', value);
        break;
      case 'comment':
        attributes.comment = value ?? null;
        break;
      case 'commenturl':
        attributes.comment_url = value ?? null;
        break;
      case 'port':
        attributes.port = value ?? '';
        break;
      case 'secure':
        attributes.secure = true;
        break;
      case 'httponly':
        attributes.httponly = true;
        break;
      case 'discard':
        attributes.discard = true;
        break;
    }
  }

  return new Cookie(url, attributes);
}

/**
 * Parses one `Set-Cookie` string, which may hold several comma-joined cookies.
 *
 * @throws {SetCookieParseError} for a malformed pair, a bad integer attribute
 *   or an `Expires` that isn't a time (the cause is kept)
 */
export function parseSetCookie(url: string, str: string): Cookie[] {
  return str
    .split(COOKIE_SEPARATOR)
    .filter((part) => part.trim().length > 0)
    .map((part) => {
      try {
        return parseOne(url, part);
      } catch (e) {
        if (isSetCookieParseError(e)) throw e;
        throw new SetCookieParseError(part, e instanceof Error ? e.message : String(e), { cause: e });
      }
    });
}

/** All or nothing: one bad string fails the whole batch. */
export function parseSetCookies(url: string, strings: readonly string[]): Result<Cookie[], SetCookieParseError> {
  const unique = [...new Set(strings)];
  try {
    return ok(unique.flatMap((str) => parseSetCookie(url, str)));
  } catch (e) {
    if (isSetCookieParseError(e)) return fail(e);
    throw e;
  }
}

/**
 * @example
 *   fromSetCookie('http://owner-url.com', 'coo%40ki+e2=blah+val2%40');
 *   // => [cookie with name 'coo@ki e2' and value 'blah val2@']
 */
export function fromSetCookie(url: string, input: string | readonly string[]): Cookie[] {
  const result = parseSetCookies(url, typeof input === 'string' ? [input] : input);
  return result.ok ? result.value : [];
}
