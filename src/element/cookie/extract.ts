import { load, type CheerioAPI } from 'cheerio';
import { toError } from '../../errors.js';
import { fail, ok, type HttpHeaders, type HttpResponse, type Result } from '../../types.js';
import { uniqueElements } from '../base.js';
import type { Cookie } from './cookie.js';
import { parseSetCookies } from './set-cookie.js';

const HEAD = /<head(.*)<\/head>/is;

export function extractFromHeaders(url: string, headers: HttpHeaders): Result<Cookie[]> {
  let values: string[] = [];
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === 'set-cookie' && value !== undefined) {
      values = Array.isArray(value) ? [...value] : [value];
    }
  }
  if (values.length === 0) return ok([]);
  return parseSetCookies(url, values);
}

/**
 * @example
 *   fromHeaders('http://owner-url.com', { 'Set-Cookie': ['a=1; Path=/; Secure', 'b=2; HttpOnly'] });
 */
export function fromHeaders(url: string, headers: HttpHeaders): Cookie[] {
  const result = extractFromHeaders(url, headers);
  return result.ok ? result.value : [];
}

function metaSetCookies($: CheerioAPI): string[] {
  const strings: string[] = [];
  $('meta[http-equiv]').each((_, el) => {
    const meta = $(el);
    if (meta.attr('http-equiv')?.toLowerCase() !== 'set-cookie') return;
    const content = meta.attr('content');
    if (content !== undefined) strings.push(content);
  });
  return strings;
}

/**
 * Cookies from `<meta http-equiv="Set-Cookie" content="...">` tags. Raw text
 * is only handed to the HTML parser when its `<head>` mentions set-cookie.
 */
export function extractFromDocument(url: string, document: string | CheerioAPI): Result<Cookie[]> {
  let $: CheerioAPI;
  if (typeof document === 'string') {
    const head = HEAD.exec(document);
    if (!head || !head[0].toLowerCase().includes('set-cookie')) return ok([]);
    try {
      $ = load(head[0]);
    } catch (e) {
      return fail(toError(e));
    }
  } else {
    $ = document;
  }

  try {
    return parseSetCookies(url, metaSetCookies($));
  } catch (e) {
    return fail(toError(e));
  }
}

export function fromDocument(url: string, document: string | CheerioAPI): Cookie[] {
  const result = extractFromDocument(url, document);
  return result.ok ? result.value : [];
}

/** Document cookies first, then header cookies not already among them. */
export function fromResponse(response: HttpResponse): Cookie[] {
  return uniqueElements([
    ...fromDocument(response.url, response.body),
    ...fromHeaders(response.url, response.headers),
  ]);
}
