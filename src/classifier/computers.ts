import { ParseError } from '../errors.js';
import type { ComputerRecord } from '../jamf/types.js';
import { compareVersions, parseVersion } from './version.js';

export type ClassificationBucket = 'Recent' | 'Stale' | 'CompliantWithOS' | 'NonCompliantWithOS';

export const BUCKETS: readonly ClassificationBucket[] = ['Recent', 'Stale', 'CompliantWithOS', 'NonCompliantWithOS'];

export const DEFAULT_STALE_THRESHOLD_DAYS = 10;

const DAY_MS = 86_400_000;
const LAST_CONTACT = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

export interface ClassifiedComputer {
  readonly record: ComputerRecord;
  readonly ageDays: number;
}

export interface RejectedComputer {
  readonly record: ComputerRecord;
  readonly error: ParseError;
}

export interface Classification {
  readonly buckets: Readonly<Record<ClassificationBucket, readonly ClassifiedComputer[]>>;
  readonly rejected: readonly RejectedComputer[];
}

export interface ClassifyOptions {
  /** Minimum acceptable OS version, dotted numeric. */
  osFilter?: string;
  staleThresholdDays?: number;
  now?: Date;
}

/** Parse a `YYYY-MM-DD HH:MM:SS` timestamp as UTC. */
export function parseLastContact(raw: string, recordId?: number): Date {
  const fail = () =>
    new ParseError(`Unparsable last contact time: '${raw}'`, {
      field: 'last_contact_time',
      recordId,
      context: { value: raw },
    });

  const match = LAST_CONTACT.exec(raw.trim());
  if (!match) throw fail();

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(ms);
  // Date.UTC rolls invalid fields over (Feb 30 -> Mar 1); reject those.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw fail();
  }
  return date;
}

export function ageInDays(lastContact: Date, now: Date): number {
  return Math.floor(Math.abs(now.getTime() - lastContact.getTime()) / DAY_MS);
}

/**
 * Assign one bucket to a record. Staleness dominates: a stale record's OS
 * version is never looked at.
 */
export function classifyComputer(
  record: ComputerRecord,
  osFilter: readonly number[] | null,
  staleThresholdDays: number,
  now: Date,
): ClassifiedComputer & { bucket: ClassificationBucket } {
  const ageDays = ageInDays(parseLastContact(record.lastContactTime, record.id), now);

  if (ageDays >= staleThresholdDays) {
    return { record, ageDays, bucket: 'Stale' };
  }
  if (!osFilter) {
    return { record, ageDays, bucket: 'Recent' };
  }

  const version = parseVersion(record.osVersion, record.id);
  const bucket = compareVersions(version, osFilter) >= 0 ? 'CompliantWithOS' : 'NonCompliantWithOS';
  return { record, ageDays, bucket };
}

export function classify(records: readonly ComputerRecord[], options: ClassifyOptions = {}): Classification {
  const now = options.now ?? new Date();
  const threshold = options.staleThresholdDays ?? DEFAULT_STALE_THRESHOLD_DAYS;
  const osFilter = options.osFilter === undefined ? null : parseVersion(options.osFilter);

  const buckets: Record<ClassificationBucket, ClassifiedComputer[]> = {
    Recent: [],
    Stale: [],
    CompliantWithOS: [],
    NonCompliantWithOS: [],
  };
  const rejected: RejectedComputer[] = [];

  for (const record of records) {
    try {
      const { bucket, ageDays } = classifyComputer(record, osFilter, threshold, now);
      buckets[bucket].push({ record, ageDays });
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      rejected.push({ record, error: err });
    }
  }

  return { buckets, rejected };
}

/** Records that checked in within the threshold, whatever their OS bucket. */
export function countRecent(classification: Classification): number {
  const { Recent, CompliantWithOS, NonCompliantWithOS } = classification.buckets;
  return Recent.length + CompliantWithOS.length + NonCompliantWithOS.length;
}
