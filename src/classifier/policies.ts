import type { PolicyRecord } from '../jamf/types.js';

/**
 * Policies whose name contains any of the queries (case-sensitive substring).
 * Each policy appears at most once, in collection order.
 */
export function filterPolicies<T extends Pick<PolicyRecord, 'name'>>(
  all: readonly T[],
  nameQueries: readonly string[],
): T[] {
  if (nameQueries.length === 0) return [];
  return all.filter(policy => nameQueries.some(query => policy.name.includes(query)));
}

/** Queries that matched nothing, in the order given. */
export function unmatchedQueries(
  all: readonly Pick<PolicyRecord, 'name'>[],
  nameQueries: readonly string[],
): string[] {
  return nameQueries.filter(query => !all.some(policy => policy.name.includes(query)));
}

export interface PolicySummary {
  id: number;
  name: string;
  pkg: string;
  scope: string;
}

export function summarizePolicy(policy: PolicyRecord): PolicySummary {
  return {
    id: policy.id,
    name: policy.name,
    pkg: policy.packages[0] ?? 'none',
    scope: policy.scopeGroups[0] ?? 'none',
  };
}
