import { JamfError } from '../errors.js';
import type { HttpTransport } from '../jamf/transport.js';
import type { ObjectKind } from '../jamf/types.js';
import { logger } from '../logger.js';
import { sleep } from '../utils.js';

export type DeleteOutcome = 'Success' | 'Conflict' | 'Unauthorized' | 'ExhaustedRetries';

export type StatusVerdict = 'success' | 'conflict' | 'unauthorized' | 'retry';

export interface DeleteResult {
  readonly id: number;
  readonly kind: ObjectKind;
  readonly outcome: DeleteOutcome;
  readonly attempts: number;
  /** Status of the last attempt; `null` if it failed before a response arrived. */
  readonly lastStatus: number | null;
}

export interface RetryStrategy {
  maxAttempts: number;
  delayMs: number;
  sleep: (ms: number) => Promise<void>;
}

/** Fixed, non-exponential: Jamf is slow to settle policy deletions. */
export const DEFAULT_RETRY_STRATEGY: RetryStrategy = {
  maxAttempts: 5,
  delayMs: 30_000,
  sleep,
};

const ENDPOINTS: Record<ObjectKind, string> = {
  computer: '/JSSResource/computers/id',
  policy: '/JSSResource/policies/id',
};

export function interpretStatus(status: number): StatusVerdict {
  switch (status) {
    case 200:
    case 201:
      return 'success';
    case 409:
      return 'conflict';
    case 401:
      return 'unauthorized';
    default:
      return 'retry';
  }
}

const TERMINAL: Record<Exclude<StatusVerdict, 'retry'>, DeleteOutcome> = {
  success: 'Success',
  conflict: 'Conflict',
  unauthorized: 'Unauthorized',
};

export function deletePath(kind: ObjectKind, id: number): string {
  return `${ENDPOINTS[kind]}/${id}`;
}

/**
 * Delete one object, retrying on anything that is not a definite answer.
 * 200/201, 409 and 401 end the protocol at once; any other status (or a
 * network failure) is retried after a fixed delay, up to `maxAttempts`
 * requests in total.
 */
export async function deleteObject(
  transport: HttpTransport,
  id: number,
  kind: ObjectKind,
  strategy: RetryStrategy = DEFAULT_RETRY_STRATEGY,
): Promise<DeleteResult> {
  const path = deletePath(kind, id);
  let lastStatus: number | null = null;

  for (let attempt = 1; attempt <= strategy.maxAttempts; attempt++) {
    logger.debug(`${kind} ${id} delete attempt ${attempt}/${strategy.maxAttempts}`);

    try {
      const response = await transport.send({ method: 'DELETE', path });
      lastStatus = response.statusCode;
    } catch (err) {
      if (!(err instanceof JamfError)) throw err;
      lastStatus = null;
      logger.warn(`${kind} ${id} delete attempt ${attempt} failed: ${err.message}`);
    }

    if (lastStatus !== null) {
      const verdict = interpretStatus(lastStatus);
      if (verdict !== 'retry') {
        return { id, kind, outcome: TERMINAL[verdict], attempts: attempt, lastStatus };
      }
    }

    if (attempt < strategy.maxAttempts) {
      logger.debug(`${kind} ${id} delete returned ${lastStatus ?? 'no response'}, retrying in ${strategy.delayMs}ms`);
      await strategy.sleep(strategy.delayMs);
    }
  }

  return { id, kind, outcome: 'ExhaustedRetries', attempts: strategy.maxAttempts, lastStatus };
}
