import { describe, it, expect } from 'vitest';
import { Severity, type Finding } from '../types.js';
import { groupFindings } from './terminal.js';

function finding(overrides: Partial<Finding>): Finding {
  return {
    source: 'cookies.jar',
    line: 1,
    cookie: 'sid',
    severity: Severity.Medium,
    category: 'Insecure Cookie',
    message: 'm',
    rule: 'COOKIE_NO_HTTPONLY',
    ...overrides,
  };
}

describe('groupFindings', () => {
  it('groups by source, then by cookie, most severe first', () => {
    const groups = groupFindings([
      finding({ rule: 'COOKIE_EXPIRED', severity: Severity.Info }),
      finding({ rule: 'COOKIE_NO_HTTPONLY' }),
      finding({ cookie: 'lang', line: 2 }),
      finding({ source: 'https://test.com/', line: 0, rule: 'COOKIE_NO_SECURE' }),
    ]);

    expect([...groups.keys()]).toEqual(['cookies.jar', 'https://test.com/']);
    const jar = groups.get('cookies.jar');
    expect([...(jar?.keys() ?? [])]).toEqual(['sid:1', 'lang:2']);
    expect(jar?.get('sid:1')?.map((f) => f.rule)).toEqual(['COOKIE_NO_HTTPONLY', 'COOKIE_EXPIRED']);
    expect(groups.get('https://test.com/')?.get('sid')?.map((f) => f.rule)).toEqual(['COOKIE_NO_SECURE']);
  });

  it('keeps same-named cookies on different jar lines apart', () => {
    const groups = groupFindings([finding({ line: 3 }), finding({ line: 9 })]);
    expect([...(groups.get('cookies.jar')?.keys() ?? [])]).toEqual(['sid:3', 'sid:9']);
  });
});
