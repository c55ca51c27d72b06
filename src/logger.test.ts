import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// vi.hoisted runs before vi.mock hoisting, so the mock fn is available in the factory
const { mockGetRunId } = vi.hoisted(() => ({
  mockGetRunId: vi.fn<() => string | undefined>(),
}));
vi.mock('./context.js', () => ({
  getRunId: mockGetRunId,
}));

// In the test environment process.stdout.isTTY is falsy,
// so the logger will use the JSON (non-TTY) code path.
import { logger, setLogLevel, getLogLevel, isLogLevel } from './logger.js';

function lineAt(spy: { mock: { calls: unknown[][] } }, index: number): Record<string, unknown> {
  return JSON.parse(String(spy.mock.calls[index][0]));
}

describe('logger', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    mockGetRunId.mockReturnValue(undefined);
    setLogLevel('info');
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    mockGetRunId.mockReset();
  });

  describe('output routing', () => {
    it('info writes to stdout via console.log', () => {
      logger.info('hello');
      expect(logSpy).toHaveBeenCalledOnce();
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('error writes to stderr via console.error', () => {
      logger.error('boom');
      expect(errorSpy).toHaveBeenCalledOnce();
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('warn writes to stdout via console.log', () => {
      logger.warn('caution');
      expect(logSpy).toHaveBeenCalledOnce();
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });

  describe('JSON format', () => {
    it('outputs valid JSON with timestamp, level, and message', () => {
      logger.info('structured');

      const parsed = lineAt(logSpy, 0);
      expect(parsed.level).toBe('info');
      expect(parsed.message).toBe('structured');
      expect(typeof parsed.timestamp).toBe('string');
      expect(new Date(String(parsed.timestamp)).toISOString()).toBe(parsed.timestamp);
    });

    it('spreads metadata into the output', () => {
      logger.info('with meta', { policyId: 42, attempt: 2 });

      const parsed = lineAt(logSpy, 0);
      expect(parsed.policyId).toBe(42);
      expect(parsed.attempt).toBe(2);
    });

    it('outputs only the base keys when no metadata is provided', () => {
      logger.info('bare');

      expect(Object.keys(lineAt(logSpy, 0)).sort()).toEqual(['level', 'message', 'timestamp']);
    });
  });

  describe('run ID', () => {
    it('includes runId when running inside a context', () => {
      mockGetRunId.mockReturnValue('abc-123-def-456');
      logger.info('with rid');

      expect(lineAt(logSpy, 0).runId).toBe('abc-123-def-456');
    });

    it('omits runId outside a context', () => {
      logger.info('no rid');

      expect('runId' in lineAt(logSpy, 0)).toBe(false);
    });
  });

  describe('level filtering', () => {
    it('debug is filtered out at the info level', () => {
      logger.debug('should not appear');
      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('debug appears once the level is lowered', () => {
      setLogLevel('debug');
      logger.debug('visible');
      expect(logSpy).toHaveBeenCalledOnce();
      expect(getLogLevel()).toBe('debug');
    });

    it('warn level drops info but keeps error', () => {
      setLogLevel('warn');
      logger.info('dropped');
      logger.error('kept');
      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledOnce();
    });
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
