import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport, cookieHeader } from './transport.js';

function stubFetch() {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => ({
    url: '',
    status: 200,
    headers: new Headers([
      ['content-type', 'text/html'],
      ['set-cookie', 'a=1'],
      ['set-cookie', 'b=2'],
    ]),
    text: async () => '<html></html>',
  }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('cookieHeader', () => {
  it('joins encoded pairs', () => {
    expect(cookieHeader({ sid: 'a b', 'x;y': '1=2' })).toBe('sid=a+b; x%3By=1%3D2');
  });
});

describe('FetchTransport', () => {
  it('puts GET params in the query string and cookies in the Cookie header', async () => {
    const fetchMock = stubFetch();
    await new FetchTransport().get('http://test.com/search', {
      params: { q: '1' },
      cookies: { sid: 'a b' },
      headers: { 'X-Test': 'yes' },
    });

    const [url, init] = fetchMock.mock.calls[0];
    const headers = new Headers(init?.headers);
    expect(url).toBe('http://test.com/search?q=1');
    expect(init?.method).toBe('GET');
    expect(headers.get('cookie')).toBe('sid=a+b');
    expect(headers.get('x-test')).toBe('yes');
  });

  it('sends POST params as a form body', async () => {
    const fetchMock = stubFetch();
    await new FetchTransport().post('http://test.com/login', {
      params: { user: 'x', note: 'hi there' },
      cookies: {},
      headers: {},
    });

    const [url, init] = fetchMock.mock.calls[0];
    const headers = new Headers(init?.headers);
    expect(url).toBe('http://test.com/login');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('user=x&note=hi+there');
    expect(headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(headers.has('cookie')).toBe(false);
  });

  it('keeps every Set-Cookie value of the response', async () => {
    stubFetch();
    const response = await new FetchTransport().get('http://test.com/', { params: {}, cookies: {}, headers: {} });

    expect(response).toEqual({
      url: 'http://test.com/',
      status: 200,
      headers: { 'content-type': 'text/html', 'set-cookie': ['a=1', 'b=2'] },
      body: '<html></html>',
    });
  });
});
