import { describe, it, expect } from 'vitest';
import { DEFAULT_PLACEHOLDER, fillInputs } from './key-filler.js';

describe('fillInputs', () => {
  it('picks placeholders by input name', () => {
    expect(fillInputs({ email: '', password: '', login: '', homepage_url: '', zip: '' })).toEqual({
      email: 'cookieprobe@example.com',
      password: 'test-password',
      login: 'cookieprobe_user',
      homepage_url: 'http://www.example.com',
      zip: '132',
    });
  });

  it('keeps filled inputs', () => {
    expect(fillInputs({ email: 'a@b.c' })).toEqual({ email: 'a@b.c' });
  });

  it('falls back to the default placeholder', () => {
    expect(fillInputs({ q: '' })).toEqual({ q: DEFAULT_PLACEHOLDER });
  });
});
