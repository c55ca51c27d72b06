import { filterPolicies, summarizePolicy, unmatchedQueries, type PolicySummary } from '../classifier/policies.js';
import { JamfError } from '../errors.js';
import type { NamedRef } from '../jamf/types.js';
import { logger } from '../logger.js';
import { DEFAULT_RETRY_STRATEGY, deleteObject, type DeleteResult } from '../orchestrator/delete.js';
import {
  formatCategoryHeading,
  formatDeleteResult,
  formatPolicyListing,
  formatPolicyTarget,
  paint,
} from '../report/format.js';
import { buildQueryNotice } from '../slack/templates.js';
import type { JobDeps } from './types.js';

export interface DeleteOptions {
  delete: boolean;
}

export interface PolicySearchResult {
  queries: string[];
  targets: NamedRef[];
  unmatched: string[];
  deletions: DeleteResult[];
}

/** A category or policy that could not be read; the batch carried on without it. */
export interface SkippedItem {
  kind: 'category' | 'policy';
  id: number;
  name: string;
  reason: string;
}

export interface PolicyListingResult {
  total: number;
  categories: { id: number; name: string; policies: PolicySummary[] }[];
  skipped: SkippedItem[];
  slackPosted: boolean;
}

export interface CategoryCleanupEntry {
  category: string;
  found: boolean;
  targets: NamedRef[];
  deletions: DeleteResult[];
  /** Set when the category could not be read. */
  error: string | null;
}

export interface NameCleanupEntry {
  name: string;
  id: number | null;
  group: string | null;
  deletion: DeleteResult | null;
  error: string | null;
}

/** Delete each target in order; a terminal outcome on one never stops the rest. */
async function deletePolicies(deps: JobDeps, targets: readonly NamedRef[]): Promise<DeleteResult[]> {
  const results: DeleteResult[] = [];
  for (const target of targets) {
    const result = await deleteObject(deps.transport, target.id, 'policy', deps.retry ?? DEFAULT_RETRY_STRATEGY);
    deps.print(formatDeleteResult(result, { color: deps.color }));
    results.push(result);
  }
  return results;
}

function toRef(policy: NamedRef): NamedRef {
  return { id: policy.id, name: policy.name };
}

/** Run one record-level read; a `JamfError` is logged and handed back instead of thrown. */
async function attempt<T>(label: string, read: () => Promise<T>): Promise<{ value: T } | { error: JamfError }> {
  try {
    return { value: await read() };
  } catch (err) {
    if (!(err instanceof JamfError)) throw err;
    logger.error(`Skipping ${label}: ${err.message}`);
    return { error: err };
  }
}

export async function runPolicySearch(
  deps: JobDeps,
  queries: readonly string[],
  options: DeleteOptions,
): Promise<PolicySearchResult> {
  const all = await deps.fetcher.listPolicies();
  const targets = filterPolicies(all, queries).map(toRef);
  const unmatched = unmatchedQueries(all, queries);
  deps.print(`Searching ${all.length} policies on ${deps.jamfUrl}`);

  for (const query of unmatched) {
    deps.print(paint(`No match found: ${query}`, 'fail', { color: deps.color }));
  }
  for (const target of targets) {
    deps.print(formatPolicyTarget(target, { color: deps.color }));
  }
  if (targets.length > 0) {
    deps.print(`${targets.length} total matches`);
  }

  const deletions = options.delete ? await deletePolicies(deps, targets) : [];
  return { queries: [...queries], targets, unmatched, deletions };
}

export async function runPolicyListing(deps: JobDeps): Promise<PolicyListingResult> {
  const categories = await deps.fetcher.listCategories();
  const listed: PolicyListingResult['categories'] = [];
  const skipped: SkippedItem[] = [];
  let total = 0;

  for (const category of categories) {
    deps.print(formatCategoryHeading(category, { color: deps.color }));
    const refs = await attempt(`category '${category.name}'`, () =>
      deps.fetcher.listPoliciesInCategory(category.name),
    );
    if ('error' in refs) {
      deps.print(paint(`Category '${category.name}' could not be read: ${refs.error.message}`, 'fail', { color: deps.color }));
      skipped.push({ kind: 'category', id: category.id, name: category.name, reason: refs.error.message });
      continue;
    }

    const policies: PolicySummary[] = [];
    for (const ref of refs.value) {
      const detail = await attempt(`policy ${ref.id}`, () => deps.fetcher.getPolicy(ref.id));
      if ('error' in detail) {
        deps.print(paint(`Policy '${ref.id}' could not be read: ${detail.error.message}`, 'fail', { color: deps.color }));
        skipped.push({ kind: 'policy', id: ref.id, name: ref.name, reason: detail.error.message });
        continue;
      }
      const summary = summarizePolicy(detail.value);
      deps.print(formatPolicyListing(summary, { color: deps.color }));
      policies.push(summary);
    }
    total += policies.length;
    listed.push({ id: category.id, name: category.name, policies });
  }
  deps.print(paint(`All policies listed above, program complete for ${deps.jamfUrl}`, 'ok', { color: deps.color }));

  let slackPosted = false;
  if (deps.notifier) {
    await deps.notifier.post(buildQueryNotice(total, deps.jamfUrl));
    slackPosted = true;
  }

  return { total, categories: listed, skipped, slackPosted };
}

export async function runCategoryCleanup(
  deps: JobDeps,
  categories: readonly string[],
  options: DeleteOptions,
): Promise<CategoryCleanupEntry[]> {
  const entries: CategoryCleanupEntry[] = [];

  for (const category of categories) {
    const refs = await attempt(`category '${category}'`, () => deps.fetcher.listPoliciesInCategory(category));
    if ('error' in refs) {
      deps.print(paint(`Category '${category}' could not be read: ${refs.error.message}`, 'fail', { color: deps.color }));
      entries.push({ category, found: false, targets: [], deletions: [], error: refs.error.message });
      continue;
    }

    const targets = refs.value.map(toRef);
    if (targets.length === 0) {
      deps.print(paint(`Category '${category}' not found`, 'fail', { color: deps.color }));
      entries.push({ category, found: false, targets, deletions: [], error: null });
      continue;
    }

    deps.print(paint(`Category '${category}': ${targets.length} policies`, 'header', { color: deps.color }));
    for (const target of targets) {
      deps.print(formatPolicyTarget(target, { color: deps.color }));
    }

    const deletions = options.delete ? await deletePolicies(deps, targets) : [];
    entries.push({ category, found: true, targets, deletions, error: null });
  }

  return entries;
}

export async function runNameCleanup(
  deps: JobDeps,
  names: readonly string[],
  options: DeleteOptions,
): Promise<NameCleanupEntry[]> {
  const entries: NameCleanupEntry[] = [];

  for (const name of names) {
    const id = await deps.fetcher.findPolicyIdByName(name);
    if (id === null) {
      deps.print(paint(`Policy '${name}' not found`, 'fail', { color: deps.color }));
      entries.push({ name, id: null, group: null, deletion: null, error: null });
      continue;
    }

    const detail = await attempt(`policy ${id}`, () => deps.fetcher.getPolicy(id));
    if ('error' in detail) {
      deps.print(paint(`Policy '${name}' could not be read: ${detail.error.message}`, 'fail', { color: deps.color }));
      entries.push({ name, id, group: null, deletion: null, error: detail.error.message });
      continue;
    }

    const { scope } = summarizePolicy(detail.value);
    deps.print(paint(`Match found: '${name}' ID: ${id} Group: ${scope}`, 'warning', { color: deps.color }));

    const [deletion] = options.delete ? await deletePolicies(deps, [{ id, name }]) : [];
    entries.push({ name, id, group: scope, deletion: deletion ?? null, error: null });
  }

  return entries;
}
