export { loadConfig, requireWebhook, encodeCredentials, type Config, type ConfigOverrides } from './config.js';
export { AppError, ConfigError, JamfError, ParseError, SlackError, TimeoutError } from './errors.js';
export { logger, setLogLevel, type LogLevel } from './logger.js';
export { runWithContext, getRunId, getRunMode, type RunMode } from './context.js';

export {
  JamfTransport,
  selectAuthScheme,
  selectContentHeaders,
  type HttpTransport,
  type JamfRequest,
  type JamfResponse,
} from './jamf/transport.js';
export { RecordFetcher } from './jamf/fetcher.js';
export type { ComputerRecord, PolicyRecord, NamedRef, ObjectKind } from './jamf/types.js';

export {
  classify,
  classifyComputer,
  countRecent,
  parseLastContact,
  type Classification,
  type ClassificationBucket,
  type ClassifiedComputer,
} from './classifier/computers.js';
export { compareVersions, parseVersion } from './classifier/version.js';
export { filterPolicies, summarizePolicy, type PolicySummary } from './classifier/policies.js';

export {
  deleteObject,
  interpretStatus,
  DEFAULT_RETRY_STRATEGY,
  type DeleteOutcome,
  type DeleteResult,
  type RetryStrategy,
} from './orchestrator/delete.js';
export { healthScore, formatHealthScore } from './report/format.js';
export { SlackClient, type Notifier } from './slack/client.js';

export { runComputerReport } from './jobs/computers.js';
export { runPolicySearch, runPolicyListing, runCategoryCleanup, runNameCleanup } from './jobs/policies.js';
