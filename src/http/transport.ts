import { encode } from '../element/cookie/codec.js';
import type { HttpHeaders, HttpRequestPlan, HttpResponse, Inputs } from '../types.js';

export interface HttpTransport {
  get(url: string, request: Omit<HttpRequestPlan, 'method' | 'url'>): Promise<HttpResponse>;
  post(url: string, request: Omit<HttpRequestPlan, 'method' | 'url'>): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds. */
  timeout?: number;
  headers?: HttpHeaders;
}

export function cookieHeader(cookies: Inputs): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${encode(name)}=${encode(value)}`)
    .join('; ');
}

function toHeaderInit(headers: HttpHeaders): Headers {
  const result = new Headers();
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    for (const item of Array.isArray(value) ? value : [value]) result.append(key, item);
  }
  return result;
}

function fromFetchHeaders(headers: Headers): HttpHeaders {
  const result: HttpHeaders = {};
  headers.forEach((value, key) => {
    if (key !== 'set-cookie') result[key] = value;
  });
  const setCookies = headers.getSetCookie();
  if (setCookies.length > 0) result['set-cookie'] = setCookies;
  return result;
}

export class FetchTransport implements HttpTransport {
  private timeout: number;
  private headers: HttpHeaders;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? 10_000;
    this.headers = options.headers ?? {};
  }

  get(url: string, request: Omit<HttpRequestPlan, 'method' | 'url'>): Promise<HttpResponse> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(request.params)) target.searchParams.set(key, value);
    return this.send('GET', target.toString(), request);
  }

  post(url: string, request: Omit<HttpRequestPlan, 'method' | 'url'>): Promise<HttpResponse> {
    return this.send('POST', url, request, new URLSearchParams(request.params).toString());
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    request: Omit<HttpRequestPlan, 'method' | 'url'>,
    body?: string
  ): Promise<HttpResponse> {
    const headers = toHeaderInit({ ...this.headers, ...request.headers });
    if (Object.keys(request.cookies).length > 0) headers.set('Cookie', cookieHeader(request.cookies));
    if (body !== undefined) headers.set('Content-Type', 'application/x-www-form-urlencoded');

    const res = await fetch(url, {
      method,
      headers,
      body,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeout),
    });

    return {
      url: res.url || url,
      status: res.status,
      headers: fromFetchHeaders(res.headers),
      body: await res.text(),
    };
  }
}
