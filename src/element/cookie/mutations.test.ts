import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../logger.js';
import { Form, Link, type Page } from '../page.js';
import { Cookie } from './cookie.js';
import { PARAM_FLIP } from './mutations.js';

const URL_ = 'http://test.com/';

function page(): Page {
  return {
    url: URL_,
    links: [new Link(URL_, { q: '' }, 'http://test.com/search'), new Link(URL_, {}, 'http://test.com/about')],
    forms: [new Form(URL_, { user: '', note: 'hi' }, 'post', 'http://test.com/login')],
  };
}

describe('Cookie#mutations', () => {
  it('replaces and appends the payload', () => {
    const mutations = new Cookie(URL_, { name: 'sid', value: 'abc' }).mutations('<x>');
    expect(mutations.map((m) => m.auditable)).toEqual([{ sid: '<x>' }, { sid: 'abc<x>' }]);
    expect(mutations.every((m) => m.type === 'cookie' && m.altered === 'sid')).toBe(true);
  });

  it('drops identical variants', () => {
    expect(new Cookie(URL_, { name: 'sid', value: '' }).mutations('p')).toHaveLength(1);
  });

  it('honours the strategy filter', () => {
    const mutations = new Cookie(URL_, { name: 'sid', value: 'abc' }).mutations('p', { strategies: ['append'] });
    expect(mutations.map((m) => m.auditable)).toEqual([{ sid: 'abcp' }]);
  });

  it('adds a parameter flip', () => {
    const mutations = new Cookie(URL_, { name: 'sid', value: 'abc' }).mutations('<x>', {
      paramFlip: true,
      seed: 'test-seed',
    });
    expect(mutations).toHaveLength(3);
    const flipped = mutations[2];
    expect(flipped.auditable).toEqual({ '<x>': 'test-seed' });
    expect(flipped.altered).toBe(PARAM_FLIP);
    expect(flipped.isScopeOverridden()).toBe(true);
  });

  it('leaves the source cookie untouched', () => {
    const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
    cookie.mutations('p', { paramFlip: true, seed: 'test-seed' });
    expect(cookie.auditable).toEqual({ sid: 'abc' });
    expect(cookie.isScopeOverridden()).toBe(false);
  });

  describe('extensive mode', () => {
    it('propagates every variant to links and forms with inputs', () => {
      const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
      cookie.auditor = { page: page(), logger: silentLogger };
      const mutations = cookie.mutations('p', { auditCookiesExtensively: true });

      expect(mutations).toHaveLength(6);
      const propagated = mutations.filter((m) => m.type !== 'cookie');
      expect(propagated.map((m) => [m.type, m.opts.cookies])).toEqual([
        ['link', { sid: 'p' }],
        ['form', { sid: 'p' }],
        ['link', { sid: 'abcp' }],
        ['form', { sid: 'abcp' }],
      ]);
    });

    it('fills empty inputs and labels the clones', () => {
      const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
      cookie.auditor = { page: page(), logger: silentLogger };
      const form = cookie.mutations('p', { auditCookiesExtensively: true }).find((m) => m.type === 'form');

      expect(form?.method).toBe('post');
      expect(form?.action).toBe('http://test.com/login');
      expect(form?.auditable).toEqual({ user: 'cookieprobe_user', note: 'hi' });
      expect(form?.altered).toBe("mutation for the 'sid' cookie");
    });

    it('does not touch the page elements', () => {
      const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
      const p = page();
      cookie.auditor = { page: p, logger: silentLogger };
      cookie.mutations('p', { auditCookiesExtensively: true });
      expect(p.links[0].opts.cookies).toBeUndefined();
      expect(p.links[0].auditable).toEqual({ q: '' });
    });

    it('is a no-op for orphan cookies', () => {
      const cookie = new Cookie(URL_, { name: 'sid', value: 'abc' });
      expect(cookie.isOrphan()).toBe(true);
      expect(cookie.mutations('p', { auditCookiesExtensively: true })).toHaveLength(2);
    });
  });
});
