import { describe, it, expect } from 'vitest';
import { runWithContext, getRunId, getRunMode } from './context.js';

describe('context', () => {
  it('provides runId within context', async () => {
    let capturedId: string | undefined;

    await runWithContext(() => {
      capturedId = getRunId();
    });

    expect(typeof capturedId).toBe('string');
    expect(capturedId?.length).toBeGreaterThan(0);
  });

  it('provides the run mode within context', async () => {
    let capturedMode: string | undefined;

    await runWithContext(() => {
      capturedMode = getRunMode();
    }, 'policies');

    expect(capturedMode).toBe('policies');
  });

  it('returns undefined outside context', () => {
    expect(getRunId()).toBeUndefined();
    expect(getRunMode()).toBeUndefined();
  });

  it('generates unique runIds', async () => {
    const ids: Array<string | undefined> = [];

    await runWithContext(() => {
      ids.push(getRunId());
    });

    await runWithContext(() => {
      ids.push(getRunId());
    });

    expect(ids[0]).not.toBe(ids[1]);
  });

  it('survives awaits inside async functions', async () => {
    let capturedId: string | undefined;

    await runWithContext(async () => {
      await new Promise(r => setTimeout(r, 10));
      capturedId = getRunId();
    });

    expect(capturedId).toBeDefined();
  });

  it('returns result from sync function', () => {
    const result = runWithContext(() => 42);
    expect(result).toBe(42);
  });
});
