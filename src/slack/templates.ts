import type { Classification } from '../classifier/computers.js';
import { countRecent } from '../classifier/computers.js';
import { formatComputer, formatHealthScore } from '../report/format.js';

/**
 * Fleet health message for the computer report. `null` when there is nothing
 * to score.
 */
export function buildHealthMessage(classification: Classification, jamfUrl: string): string | null {
  const stale = classification.buckets.Stale;
  const score = formatHealthScore(countRecent(classification), stale.length);
  if (score === null) return null;

  let text = `:hospital: update health: ${score} - ${stale.length} need to be fixed on ${jamfUrl}\n`;
  for (const entry of stale) {
    text += `${formatComputer(entry)}\n`;
  }
  return text;
}

export function buildQueryNotice(policyCount: number, jamfUrl: string): string {
  return `all ${policyCount} policies were just queried on ${jamfUrl}`;
}
