import type { RecordFetcher } from '../jamf/fetcher.js';
import type { HttpTransport } from '../jamf/transport.js';
import type { RetryStrategy } from '../orchestrator/delete.js';
import type { Notifier } from '../slack/client.js';

/** Everything a job needs from the outside world. */
export interface JobDeps {
  fetcher: RecordFetcher;
  transport: HttpTransport;
  /** Console sink; one call per printed line. */
  print: (line: string) => void;
  jamfUrl: string;
  retry?: RetryStrategy;
  /** Set only when `--slack` was given. */
  notifier?: Notifier | null;
  color?: boolean;
}
