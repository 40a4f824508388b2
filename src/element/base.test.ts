import { describe, it, expect } from 'vitest';
import { uniqueElements } from './base.js';
import { Form, Link } from './page.js';

describe('uniqueElements', () => {
  it('keeps the first of each identity', () => {
    const a = new Link('http://test.com/', { q: '1' });
    const b = new Link('http://test.com/', { q: '1' });
    const c = new Link('http://test.com/', { q: '2' });
    expect(uniqueElements([a, b, c])).toEqual([a, c]);
  });

  it('tells apart elements carrying different cookies', () => {
    const a = new Form('http://test.com/', { q: '1' });
    const b = a.dup();
    b.opts.cookies = { sid: 'x' };
    expect(uniqueElements([a, b])).toHaveLength(2);
  });
});

describe('dup', () => {
  it('copies state without sharing it', () => {
    const form = new Form('http://test.com/', { q: '1' }, 'post', 'http://test.com/go');
    form.opts.cookies = { sid: 'x' };
    form.overrideInstanceScope();
    const copy = form.dup();
    copy.opts.cookies = { sid: 'y' };
    copy.auditable = { q: '2' };

    expect(copy.method).toBe('post');
    expect(copy.action).toBe('http://test.com/go');
    expect(copy.isScopeOverridden()).toBe(true);
    expect(form.opts.cookies).toEqual({ sid: 'x' });
    expect(form.auditable).toEqual({ q: '1' });
  });
});
