import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type RunMode = 'computers' | 'policies';

interface RunContext {
  runId: string;
  mode?: RunMode;
}

const storage = new AsyncLocalStorage<RunContext>();

export function runWithContext<T>(
  fn: () => T | Promise<T>,
  mode?: RunMode,
): T | Promise<T> {
  const ctx: RunContext = {
    runId: randomUUID(),
    mode,
  };
  return storage.run(ctx, fn);
}

export function getRunId(): string | undefined {
  return storage.getStore()?.runId;
}

export function getRunMode(): RunMode | undefined {
  return storage.getStore()?.mode;
}
