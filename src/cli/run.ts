import * as fs from 'node:fs';
import { loadConfig, requireWebhook, type Config } from '../config.js';
import { toError } from '../errors.js';
import { RecordFetcher } from '../jamf/fetcher.js';
import { JamfTransport, type HttpTransport } from '../jamf/transport.js';
import { runComputerReport, type ComputerReportResult } from '../jobs/computers.js';
import {
  runCategoryCleanup,
  runNameCleanup,
  runPolicyListing,
  runPolicySearch,
  type CategoryCleanupEntry,
  type NameCleanupEntry,
  type PolicyListingResult,
  type PolicySearchResult,
} from '../jobs/policies.js';
import type { JobDeps } from '../jobs/types.js';
import { logger, setLogLevel } from '../logger.js';
import { SlackClient } from '../slack/client.js';
import { sleep } from '../utils.js';
import type { CliOptions } from './options.js';

/** A transport that can also check connectivity and end its session. */
export interface JamfSession extends HttpTransport {
  ping(): Promise<string>;
  close(): Promise<void>;
}

export interface RunnerDeps {
  print?: (line: string) => void;
  createSession?: (config: Config, verbosity: number) => JamfSession;
  color?: boolean;
}

export interface RunReport {
  jamfUrl: string;
  computers?: ComputerReportResult;
  search?: PolicySearchResult;
  listing?: PolicyListingResult;
  categories?: CategoryCleanupEntry[];
  names?: NameCleanupEntry[];
}

function defaultSession(config: Config, verbosity: number): JamfSession {
  return new JamfTransport({
    url: config.jamf.url,
    username: config.jamf.username,
    password: config.jamf.password,
    timeoutMs: config.jamf.timeoutMs,
    verbosity,
  });
}

/** Run one validated invocation end to end. */
export async function execute(options: CliOptions, deps: RunnerDeps = {}): Promise<RunReport> {
  const config = await loadConfig({
    url: options.url,
    user: options.user,
    password: options.password,
    prefsPath: options.prefs,
    staleThresholdDays: options.staleDays === undefined ? undefined : Number(options.staleDays),
  });
  setLogLevel(options.verbose > 0 ? 'debug' : config.logLevel);

  // Missing webhook is fatal before any request goes out.
  const notifier = options.slack ? new SlackClient(requireWebhook(config), config.slack.timeoutMs) : null;

  const session = (deps.createSession ?? defaultSession)(config, options.verbose);
  const jobDeps: JobDeps = {
    fetcher: new RecordFetcher(session),
    transport: session,
    print: deps.print ?? (line => console.log(line)),
    jamfUrl: config.jamf.url,
    retry: { maxAttempts: config.delete.maxAttempts, delayMs: config.delete.retryDelayMs, sleep },
    notifier,
    color: deps.color ?? false,
  };

  const report: RunReport = { jamfUrl: config.jamf.url };
  try {
    const version = await session.ping();
    logger.info(`Connected to Jamf Pro ${version} at ${config.jamf.url}`);

    if (options.computers) {
      report.computers = await runComputerReport(jobDeps, {
        osFilter: options.os,
        staleThresholdDays: config.classification.staleThresholdDays,
      });
    } else {
      const deleteOptions = { delete: options.delete ?? false };
      if (options.search.length > 0) {
        report.search = await runPolicySearch(jobDeps, options.search, deleteOptions);
      } else if (options.all) {
        report.listing = await runPolicyListing(jobDeps);
      }
      if (options.category.length > 0) {
        report.categories = await runCategoryCleanup(jobDeps, options.category, deleteOptions);
      }
      if (options.name.length > 0) {
        report.names = await runNameCleanup(jobDeps, options.name, deleteOptions);
      }
    }
  } finally {
    // Logged only; the job error, if any, is what propagates.
    try {
      await session.close();
    } catch (err) {
      logger.warn(`Failed to end the Jamf session: ${toError(err).message}`);
    }
  }

  if (options.save) {
    saveReport(options.save, report);
  }
  return report;
}

export function saveReport(filePath: string, report: RunReport): void {
  fs.writeFileSync(filePath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  process.stderr.write(`Saved to ${filePath}\n`);
}
