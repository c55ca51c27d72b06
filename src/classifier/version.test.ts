import { describe, it, expect } from 'vitest';
import { compareVersions, parseVersion, isVersionString } from './version.js';
import { ParseError } from '../errors.js';

function cmp(a: string, b: string): number {
  return compareVersions(parseVersion(a), parseVersion(b));
}

describe('parseVersion', () => {
  it('splits dotted numeric versions', () => {
    expect(parseVersion('14.5.1')).toEqual([14, 5, 1]);
    expect(parseVersion(' 15 ')).toEqual([15]);
  });

  it('throws ParseError on non-numeric components', () => {
    expect(() => parseVersion('14.x')).toThrow(ParseError);
    expect(() => parseVersion('')).toThrow(ParseError);
    expect(() => parseVersion('14..1')).toThrow(ParseError);
  });
});

describe('isVersionString', () => {
  it('agrees with parseVersion', () => {
    expect(isVersionString('10.15.7')).toBe(true);
    expect(isVersionString('Sonoma')).toBe(false);
  });
});

describe('compareVersions', () => {
  it('orders 10.9 below 10.10, unlike string comparison', () => {
    expect('10.9' >= '10.10').toBe(true);
    expect(cmp('10.9', '10.10')).toBe(-1);
  });

  it('treats missing components as zero', () => {
    expect(cmp('14', '14.0.0')).toBe(0);
    expect(cmp('14.0.1', '14')).toBe(1);
  });

  it('compares major versions first', () => {
    expect(cmp('13.9.9', '14.0')).toBe(-1);
    expect(cmp('15.0', '14.99')).toBe(1);
  });
});
