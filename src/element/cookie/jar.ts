import { readFileSync } from 'node:fs';
import { isTimeParseError, type TimeParseError } from '../../errors.js';
import { fail, ok, type Result } from '../../types.js';
import { Cookie } from './cookie.js';
import { expiresToTime } from './timestamp.js';

export interface CookiejarEntry {
  /** 1-based line number in the jar. */
  line: number;
  cookie: Cookie;
  /** The line had no expiry column and its fields were shifted back. */
  shifted: boolean;
}

function parseExpiry(text: string): Result<Date, TimeParseError> {
  try {
    return ok(expiresToTime(text));
  } catch (e) {
    if (isTimeParseError(e)) return fail(e);
    throw e;
  }
}

/**
 * Parses Netscape cookiejar text:
 *
 *   domain  flag  path  secure  expires  name  value
 *
 * separated by tabs. The expiry column is optional; when it doesn't parse as
 * a time the remaining fields move back one place. Blank lines, `#` comments
 * and lines with fewer than six fields are skipped.
 */
export function parseCookiejarEntries(url: string, content: string): CookiejarEntry[] {
  const entries: CookiejarEntry[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line[0] === '#') return;

    const fields = line.split('\t');
    if (fields.length < 6) return;
    const [domain, , path, secure, expires, name, value = ''] = fields;

    const expiry = parseExpiry(expires);
    const attributes = expiry.ok
      ? { domain, path, secure: secure === 'TRUE', expires: expiry.value, name, value }
      : { domain, path, secure: secure === 'TRUE', expires: null, name: expires, value: name };

    entries.push({ line: index + 1, cookie: new Cookie(url, attributes), shifted: !expiry.ok });
  });

  return entries;
}

export function parseCookiejar(url: string, content: string): Cookie[] {
  return parseCookiejarEntries(url, content).map((entry) => entry.cookie);
}

/**
 * @example
 *   // cookies.jar:
 *   //   .domain.com	TRUE	/path/to/somewhere	TRUE	Tue, 02 Oct 2012 19:25:57 GMT	first_name	first_value
 *   //   another-domain.com	FALSE	/	FALSE	second_name	second_value
 *   fromFile('http://owner-url.com', 'cookies.jar');
 *   // => [first_name=first_value, second_name=second_value]
 */
export function fromFile(url: string, filepath: string): Cookie[] {
  return parseCookiejar(url, readFileSync(filepath, 'utf-8'));
}
