export type ErrorComponent = 'jamf' | 'slack' | 'config' | 'classifier';

export class AppError extends Error {
  readonly component: ErrorComponent;
  readonly operation: string;
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(
    message: string,
    opts: {
      component: ErrorComponent;
      operation: string;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, { cause: opts.cause });
    this.name = 'AppError';
    this.component = opts.component;
    this.operation = opts.operation;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      component: this.component,
      operation: this.operation,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
      stack: this.stack,
    };
  }
}

export class JamfError extends AppError {
  /** HTTP status of the failed response; absent for network failures. */
  readonly status?: number;

  constructor(
    message: string,
    opts: { operation: string; status?: number; context?: Record<string, unknown>; cause?: Error },
  ) {
    super(message, { component: 'jamf', ...opts });
    this.name = 'JamfError';
    this.status = opts.status;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
    };
  }
}

export class SlackError extends AppError {
  constructor(
    message: string,
    opts: { operation: string; context?: Record<string, unknown>; cause?: Error },
  ) {
    super(message, { component: 'slack', ...opts });
    this.name = 'SlackError';
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    opts: { context?: Record<string, unknown>; cause?: Error },
  ) {
    super(message, { component: 'config', operation: 'load', ...opts });
    this.name = 'ConfigError';
  }
}

/**
 * A single record could not be interpreted. Raised per record and contained by
 * the caller: the record is dropped, the batch carries on.
 */
export class ParseError extends AppError {
  readonly recordId: number | null;
  readonly field: string;

  constructor(
    message: string,
    opts: { field: string; recordId?: number | null; context?: Record<string, unknown>; cause?: Error },
  ) {
    super(message, {
      component: 'classifier',
      operation: 'parse',
      context: opts.context,
      cause: opts.cause,
    });
    this.name = 'ParseError';
    this.field = opts.field;
    this.recordId = opts.recordId ?? null;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      recordId: this.recordId,
    };
  }
}

export class TimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(
    message: string,
    opts: {
      component: ErrorComponent;
      operation: string;
      timeoutMs: number;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, opts);
    this.name = 'TimeoutError';
    this.timeoutMs = opts.timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs,
    };
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
