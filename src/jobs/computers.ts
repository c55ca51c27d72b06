import { classify, countRecent, type ClassifiedComputer } from '../classifier/computers.js';
import { JamfError } from '../errors.js';
import type { ComputerRecord } from '../jamf/types.js';
import { logger } from '../logger.js';
import { formatComputerSummary, formatHealthScore } from '../report/format.js';
import { buildHealthMessage } from '../slack/templates.js';
import type { JobDeps } from './types.js';

export interface ComputerReportOptions {
  osFilter?: string;
  staleThresholdDays: number;
  now?: Date;
}

export interface ComputerEntry {
  id: number;
  name: string;
  osVersion: string;
  ageDays: number;
}

export interface ComputerReportResult {
  total: number;
  recent: ComputerEntry[];
  stale: ComputerEntry[];
  compliant: ComputerEntry[];
  nonCompliant: ComputerEntry[];
  skipped: { id: number; name: string; reason: string }[];
  healthScore: string | null;
  slackPosted: boolean;
}

function toEntry({ record, ageDays }: ClassifiedComputer): ComputerEntry {
  return { id: record.id, name: record.name, osVersion: record.osVersion, ageDays };
}

export async function runComputerReport(deps: JobDeps, options: ComputerReportOptions): Promise<ComputerReportResult> {
  const refs = await deps.fetcher.listComputers();
  logger.info(`Loading ${refs.length} computers from ${deps.jamfUrl}`);

  // One request at a time; Jamf throttles concurrent detail reads.
  const records: ComputerRecord[] = [];
  const unreadable: ComputerReportResult['skipped'] = [];
  for (const ref of refs) {
    try {
      records.push(await deps.fetcher.getComputer(ref.id));
    } catch (err) {
      if (!(err instanceof JamfError)) throw err;
      logger.error(`Skipping computer ${ref.id} (${ref.name}): ${err.message}`);
      unreadable.push({ id: ref.id, name: ref.name, reason: err.message });
    }
  }

  const classification = classify(records, {
    osFilter: options.osFilter,
    staleThresholdDays: options.staleThresholdDays,
    now: options.now,
  });

  for (const { record, error } of classification.rejected) {
    logger.error(`Skipping computer ${record.id} (${record.name}): ${error.message}`);
  }

  const skipped = [
    ...unreadable,
    ...classification.rejected.map(({ record, error }) => ({ id: record.id, name: record.name, reason: error.message })),
  ];

  for (const line of formatComputerSummary(classification, {
    osFilter: options.osFilter,
    staleThresholdDays: options.staleThresholdDays,
    color: deps.color,
  })) {
    deps.print(line);
  }
  if (unreadable.length > 0) {
    deps.print(`${unreadable.length} skipped - details could not be fetched`);
  }

  let slackPosted = false;
  if (deps.notifier) {
    const message = buildHealthMessage(classification, deps.jamfUrl);
    if (message === null) {
      logger.info('No computers to report; Slack message skipped');
    } else {
      await deps.notifier.post(message);
      slackPosted = true;
    }
  }

  const { Recent, Stale, CompliantWithOS, NonCompliantWithOS } = classification.buckets;
  return {
    total: refs.length,
    recent: Recent.map(toEntry),
    stale: Stale.map(toEntry),
    compliant: CompliantWithOS.map(toEntry),
    nonCompliant: NonCompliantWithOS.map(toEntry),
    skipped,
    healthScore: formatHealthScore(countRecent(classification), Stale.length),
    slackPosted,
  };
}
