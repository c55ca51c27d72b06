import { ParseError } from '../errors.js';

const COMPONENT = /^\d+$/;

export function parseVersion(raw: string, recordId?: number): number[] {
  const parts = raw.trim().split('.');
  if (parts.some(part => !COMPONENT.test(part))) {
    throw new ParseError(`Unparsable OS version: '${raw}'`, {
      field: 'os_version',
      recordId,
      context: { value: raw },
    });
  }
  return parts.map(Number);
}

export function isVersionString(raw: string): boolean {
  return raw.trim().split('.').every(part => COMPONENT.test(part));
}

/**
 * Component-wise numeric comparison; missing trailing components are 0, so
 * `14` and `14.0.0` are equal and `10.9` sorts before `10.10`.
 */
export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}
