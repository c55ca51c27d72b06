import { describe, it, expect } from 'vitest';
import { buildHealthMessage, buildQueryNotice } from './templates.js';
import { classify } from '../classifier/computers.js';
import type { ComputerRecord } from '../jamf/types.js';

const NOW = new Date('2026-10-19T12:00:00Z');
const URL = 'https://jamf.example.test';

function computer(id: number, lastContactTime: string): ComputerRecord {
  return { id, name: `mac-${id}`, osVersion: '14.5', depEnrolled: false, lastContactTime };
}

describe('buildHealthMessage', () => {
  it('leads with the score and lists each stale computer', () => {
    const classification = classify(
      [
        computer(1, '2026-10-18 12:00:00'),
        computer(2, '2026-10-18 12:00:00'),
        computer(3, '2026-10-18 12:00:00'),
        computer(4, '2026-10-01 12:00:00'),
      ],
      { now: NOW },
    );

    expect(buildHealthMessage(classification, URL)).toBe(
      ':hospital: update health: 75.00% - 1 need to be fixed on https://jamf.example.test\n' +
        '4 14.5\tname : mac-4\n\t\tDEP  : false\n\t\tseen : 18 days ago\n',
    );
  });

  it('returns null when there is nothing to score', () => {
    expect(buildHealthMessage(classify([], { now: NOW }), URL)).toBeNull();
  });
});

describe('buildQueryNotice', () => {
  it('names the count and server', () => {
    expect(buildQueryNotice(12, URL)).toBe('all 12 policies were just queried on https://jamf.example.test');
  });
});
