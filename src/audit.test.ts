import { describe, it, expect, vi } from 'vitest';
import { auditCookie, isExcluded, requestFor, type AuditSettings } from './audit.js';
import { Cookie } from './element/cookie/cookie.js';
import { Form } from './element/page.js';
import type { HttpTransport } from './http/transport.js';
import { silentLogger, type Logger } from './logger.js';
import type { HttpResponse } from './types.js';

const URL_ = 'http://test.com/';

function settings(overrides: Partial<AuditSettings> = {}): AuditSettings {
  return { excludeCookies: [], auditCookiesExtensively: false, paramFlip: false, seed: 'test-seed', ...overrides };
}

function fakeTransport() {
  const respond = async (url: string): Promise<HttpResponse> => ({ url, status: 200, headers: {}, body: '' });
  const get = vi.fn(respond);
  const post = vi.fn(respond);
  const transport: HttpTransport = { get, post };
  return { transport, get, post };
}

describe('requestFor', () => {
  it('sends cookies as GETs to their action with the pair in the cookie channel', () => {
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
    expect(requestFor(cookie)).toEqual({
      method: 'get',
      url: URL_,
      params: {},
      cookies: { sid: 'abc' },
      headers: {},
    });
  });

  it('sends forms with their inputs and carried cookies', () => {
    const form = new Form(URL_, { user: 'x' }, 'post', 'http://test.com/login');
    form.opts.cookies = { sid: 'p' };
    expect(requestFor(form)).toEqual({
      method: 'post',
      url: 'http://test.com/login',
      params: { user: 'x' },
      cookies: { sid: 'p' },
      headers: {},
    });
  });
});

describe('isExcluded', () => {
  it('matches on the cookie name', () => {
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
    expect(isExcluded(cookie, { excludeCookies: ['sid'] })).toBe(true);
    expect(isExcluded(cookie, { excludeCookies: ['other'] })).toBe(false);
  });
});

describe('auditCookie', () => {
  it('skips excluded cookies without sending anything', async () => {
    const { transport, get } = fakeTransport();
    const info = vi.fn();
    const logger: Logger = { ...silentLogger, info };
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });

    const outcome = await auditCookie(cookie, 'p', { settings: settings({ excludeCookies: ['sid'] }), transport, logger });

    expect(outcome.skipped).toBe(true);
    expect(outcome.mutations).toEqual([]);
    expect(get).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith("Skipping audit of 'sid' cookie.");
  });

  it('sends one request per variant', async () => {
    const { transport, get } = fakeTransport();
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });

    const outcome = await auditCookie(cookie, 'p', { settings: settings(), transport, logger: silentLogger });

    expect(outcome.skipped).toBe(false);
    expect(outcome.responses).toHaveLength(2);
    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenCalledWith(URL_, { params: {}, cookies: { sid: 'p' }, headers: {} });
    expect(get).toHaveBeenCalledWith(URL_, { params: {}, cookies: { sid: 'abcp' }, headers: {} });
  });

  it('keeps the other responses when one request fails', async () => {
    const { transport, get } = fakeTransport();
    get.mockRejectedValueOnce(new Error('timeout'));
    const warn = vi.fn();
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });

    const outcome = await auditCookie(cookie, 'p', {
      settings: settings(),
      transport,
      logger: { ...silentLogger, warn },
    });

    expect(outcome.requests).toHaveLength(2);
    expect(outcome.responses).toEqual([{ url: URL_, status: 200, headers: {}, body: '' }]);
    expect(outcome.failures).toHaveLength(1);
    expect(outcome.failures[0].request.cookies).toEqual({ sid: 'p' });
    expect(outcome.failures[0].error.message).toBe('timeout');
    expect(warn).toHaveBeenCalledWith(`GET ${URL_} failed: timeout`);
  });

  it('uses the configured seed for the parameter flip', async () => {
    const { transport } = fakeTransport();
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });

    const outcome = await auditCookie(cookie, '<x>', {
      settings: settings({ paramFlip: true }),
      transport,
      logger: silentLogger,
    });

    expect(outcome.requests.map((r) => r.cookies)).toEqual([{ sid: '<x>' }, { sid: 'abc<x>' }, { '<x>': 'test-seed' }]);
  });

  it('posts propagated forms in extensive mode', async () => {
    const { transport, post } = fakeTransport();
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
    const form = new Form(URL_, { user: '' }, 'post', 'http://test.com/login');
    cookie.auditor = { page: { url: URL_, links: [], forms: [form] }, logger: silentLogger };

    await auditCookie(cookie, 'p', {
      settings: settings({ auditCookiesExtensively: true }),
      transport,
      logger: silentLogger,
    });

    expect(post).toHaveBeenCalledTimes(2);
    expect(post).toHaveBeenCalledWith('http://test.com/login', {
      params: { user: 'cookieprobe_user' },
      cookies: { sid: 'p' },
      headers: {},
    });
  });
});
