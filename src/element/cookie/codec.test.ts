import { describe, it, expect } from 'vitest';
import { decode, encode } from './codec.js';

describe('encode', () => {
  it('escapes the header metacharacters and turns spaces into +', () => {
    expect(encode('a b+c;d%e=f')).toBe('a+b%2Bc%3Bd%25e%3Df');
  });

  it('escapes NUL', () => {
    expect(encode('a\0b')).toBe('a%00b');
  });

  it('leaves other characters alone', () => {
    expect(encode('session-ID_1.@')).toBe('session-ID_1.@');
  });
});

describe('decode', () => {
  it('reverses encode', () => {
    expect(decode(encode('a b+c;d%e=f'))).toBe('a b+c;d%e=f');
  });

  it('decodes + and percent escapes', () => {
    expect(decode('coo%40ki+e2')).toBe('coo@ki e2');
  });

  it('decodes multi-byte sequences as a whole', () => {
    expect(decode('%E2%9C%93')).toBe('✓');
  });

  it('keeps runs that are not valid UTF-8 as written', () => {
    expect(decode('%FF')).toBe('%FF');
    expect(decode('a%E2%9C+b')).toBe('a%E2%9C b');
    expect(decode('%EF%BF%BD')).toBe('\uFFFD');
  });

  it('keeps malformed escapes as written', () => {
    expect(decode('100%zz')).toBe('100%zz');
  });
});
