import { isVersionString } from '../classifier/version.js';
import type { RunMode } from '../context.js';

/** Parsed commander options. */
export type CliOptions = {
  computers?: boolean;
  policies?: boolean;
  all?: boolean;
  search: string[];
  category: string[];
  name: string[];
  os?: string;
  staleDays?: string;
  delete?: boolean;
  slack?: boolean;
  save?: string;
  url?: string;
  user?: string;
  password?: string;
  prefs?: string;
  verbose: number;
};

/** Commander reducer for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Commander reducer for `-v`, `-vv`. */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

const NON_NEGATIVE_INTEGER = /^\d+$/;

/**
 * Check flag combinations before anything touches the network. Returns the
 * reason for the first violation, or `null` when the options are usable.
 */
export function validateOptions(options: CliOptions): string | null {
  if (Boolean(options.computers) === Boolean(options.policies)) {
    return 'choose exactly one of --computers or --policies';
  }
  if (options.search.length > 0 && options.all) {
    return '--search and --all cannot be combined';
  }

  if (options.computers) {
    if (options.search.length > 0) return '--search only applies to --policies';
    if (options.category.length > 0) return '--category only applies to --policies';
    if (options.name.length > 0) return '--name only applies to --policies';
    if (options.delete) return '--delete only applies to --policies';
    if (!options.all) return '--computers requires --all';
  } else {
    if (options.os !== undefined) return '--os only applies to --computers';
    if (options.staleDays !== undefined) return '--stale-days only applies to --computers';
    if (!options.all && options.search.length === 0 && options.category.length === 0 && options.name.length === 0) {
      return '--policies requires --search, --all, --category or --name';
    }
    if (options.delete && options.all) return '--delete cannot be combined with --all';
  }

  if (options.os !== undefined && !isVersionString(options.os)) {
    return `--os must be a dotted version such as 14.2, got '${options.os}'`;
  }
  if (options.staleDays !== undefined && !NON_NEGATIVE_INTEGER.test(options.staleDays)) {
    return `--stale-days must be a non-negative integer, got '${options.staleDays}'`;
  }
  return null;
}

export function selectMode(options: CliOptions): RunMode {
  return options.computers ? 'computers' : 'policies';
}
