import type { Classification, ClassifiedComputer } from '../classifier/computers.js';
import { countRecent } from '../classifier/computers.js';
import type { PolicySummary } from '../classifier/policies.js';
import type { ObjectKind, PolicyRecord } from '../jamf/types.js';
import type { DeleteResult } from '../orchestrator/delete.js';

export type Tone = 'header' | 'ok' | 'warning' | 'fail';

const TONE_COLORS: Record<Tone, string> = {
  header: '\x1b[96m',
  ok: '\x1b[92m',
  warning: '\x1b[93m',
  fail: '\x1b[91m',
};

const RESET = '\x1b[0m';

export interface FormatOptions {
  color?: boolean;
}

export function paint(text: string, tone: Tone, options: FormatOptions = {}): string {
  return options.color ? `${TONE_COLORS[tone]}${text}${RESET}` : text;
}

const KIND_LABEL: Record<ObjectKind, string> = {
  computer: 'Computer',
  policy: 'Policy',
};

/**
 * Share of non-stale records. `null` when there are no records at all, so
 * callers can skip the score rather than divide by zero.
 */
export function healthScore(recent: number, stale: number): number | null {
  const total = recent + stale;
  if (total === 0) return null;
  return recent / total;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function formatHealthScore(recent: number, stale: number): string | null {
  const score = healthScore(recent, stale);
  return score === null ? null : formatPercent(score);
}

export function formatComputer(entry: ClassifiedComputer): string {
  const { record, ageDays } = entry;
  return (
    `${record.id} ${record.osVersion}\tname : ${record.name}\n` +
    `\t\tDEP  : ${record.depEnrolled}\n` +
    `\t\tseen : ${ageDays} days ago`
  );
}

function section(
  heading: string,
  entries: readonly ClassifiedComputer[],
  tone: Tone,
  options: FormatOptions,
): string[] {
  return [heading, ...entries.map(entry => paint(formatComputer(entry), tone, options))];
}

export interface ComputerSummaryOptions extends FormatOptions {
  osFilter?: string;
  staleThresholdDays: number;
}

export function formatComputerSummary(classification: Classification, options: ComputerSummaryOptions): string[] {
  const { Recent, Stale, CompliantWithOS, NonCompliantWithOS } = classification.buckets;
  const days = options.staleThresholdDays;
  const lines: string[] = [paint('Loading complete...', 'header', options), '', 'Summary:'];

  if (options.osFilter !== undefined) {
    if (CompliantWithOS.length > 0) {
      lines.push(...section(`${CompliantWithOS.length} compliant and recent:`, CompliantWithOS, 'ok', options));
    }
    if (NonCompliantWithOS.length > 0) {
      lines.push(...section(`${NonCompliantWithOS.length} non-compliant:`, NonCompliantWithOS, 'warning', options));
    }
    if (Stale.length > 0) {
      lines.push(...section(`${Stale.length} stale - OS version not considered:`, Stale, 'fail', options));
    }
  } else {
    lines.push(...section(`${Recent.length} last check-in within the past ${days} days`, Recent, 'ok', options));
    lines.push(...section(`${Stale.length} stale - last check-in more than ${days} days`, Stale, 'fail', options));
  }

  if (classification.rejected.length > 0) {
    lines.push(`${classification.rejected.length} skipped - check-in data could not be read`);
  }

  const score = formatHealthScore(countRecent(classification), Stale.length);
  if (score !== null) {
    lines.push(`Health: ${score}`);
  }
  return lines;
}

export function formatPolicyTarget(policy: Pick<PolicyRecord, 'id' | 'name'>, options: FormatOptions = {}): string {
  return paint(`- policy ${policy.id}\tname  : ${policy.name}`, 'warning', options);
}

export function formatCategoryHeading(category: { id: number; name: string }, options: FormatOptions = {}): string {
  return paint(`category ${category.id}\t${category.name}`, 'header', options);
}

export function formatPolicyListing(summary: PolicySummary, options: FormatOptions = {}): string {
  return (
    paint(`  policy ${summary.id}\tname  : ${summary.name}`, 'warning', options) +
    `\n\t\tpkg   : ${summary.pkg}\n` +
    `\t\tscope : ${summary.scope}`
  );
}

export function formatDeleteResult(result: DeleteResult, options: FormatOptions = {}): string {
  const label = KIND_LABEL[result.kind];
  switch (result.outcome) {
    case 'Success':
      return paint(`${label} '${result.id}' delete was successful`, 'ok', options);
    case 'Conflict':
      return paint(`WARNING: ${label} '${result.id}' delete failed due to a conflict`, 'warning', options);
    case 'Unauthorized':
      return paint(`ERROR: ${label} '${result.id}' delete failed due to permissions error`, 'fail', options);
    case 'ExhaustedRetries':
      return paint(
        `WARNING: ${label} '${result.id}' delete did not succeed after ${result.attempts} attempts ` +
          `(last HTTP status ${result.lastStatus ?? 'none'})`,
        'warning',
        options,
      );
  }
}
