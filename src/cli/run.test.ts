import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

const { mockSetLogLevel, mockSlackConstructor, mockPost } = vi.hoisted(() => ({
  mockSetLogLevel: vi.fn<(level: string) => void>(),
  mockSlackConstructor: vi.fn<(url: string, timeoutMs: number) => void>(),
  mockPost: vi.fn<(text: string) => Promise<void>>(async () => {}),
}));

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  setLogLevel: mockSetLogLevel,
}));

vi.mock('../slack/client.js', () => ({
  SlackClient: class {
    constructor(url: string, timeoutMs: number) {
      mockSlackConstructor(url, timeoutMs);
    }
    post = mockPost;
  },
}));

import { execute, type JamfSession } from './run.js';
import type { CliOptions } from './options.js';
import { ConfigError, JamfError } from '../errors.js';
import { logger } from '../logger.js';
import { ScriptedTransport, computerDetail } from '../test-support/scripted-transport.js';

const CONFIG_KEYS = [
  'JAMF_URL',
  'JAMF_USERNAME',
  'JAMF_PASSWORD',
  'JAMF_TIMEOUT_MS',
  'SLACK_WEBHOOK_URL',
  'SLACK_TIMEOUT_MS',
  'STALE_THRESHOLD_DAYS',
  'DELETE_MAX_ATTEMPTS',
  'DELETE_RETRY_DELAY_MS',
  'LOG_LEVEL',
  'AWS_SECRET_NAME',
  'AWS_REGION',
];

class FakeSession extends ScriptedTransport implements JamfSession {
  ping = vi.fn(async () => '11.5.0');
  close = vi.fn(async () => {});
}

function options(overrides: Partial<CliOptions>): CliOptions {
  return {
    search: [],
    category: [],
    name: [],
    verbose: 0,
    url: 'https://jamf.example.test',
    user: 'api-user',
    password: 'test-secret',
    ...overrides,
  };
}

describe('execute', () => {
  const originalEnv = process.env;
  let session: FakeSession;
  let lines: string[];
  let createSession: Mock<() => JamfSession>;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of CONFIG_KEYS) delete process.env[key];
    vi.clearAllMocks();
    session = new FakeSession();
    session.onJson('GET', '/JSSResource/policies', {
      policies: [
        { id: 42, name: 'Install Firefox' },
        { id: 7, name: 'Install Chrome' },
      ],
    });
    lines = [];
    createSession = vi.fn<() => JamfSession>(() => session);
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.useRealTimers();
  });

  it('searches and deletes, then ends the session', async () => {
    session.onStatuses('DELETE', '/JSSResource/policies/id/42', 200);

    const report = await execute(options({ policies: true, search: ['Firefox'], delete: true }), {
      print: line => lines.push(line),
      createSession,
    });

    expect(report.search?.deletions.map(d => d.outcome)).toEqual(['Success']);
    expect(session.count('DELETE', '/JSSResource/policies/id/42')).toBe(1);
    expect(session.ping).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([
      'Searching 2 policies on https://jamf.example.test',
      '- policy 42\tname  : Install Firefox',
      '1 total matches',
      "Policy '42' delete was successful",
    ]);
  });

  it('fails before any request when --slack has no webhook', async () => {
    const error = await execute(options({ computers: true, all: true, slack: true }), { createSession }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ConfigError);
    expect(createSession).not.toHaveBeenCalled();
  });

  it('runs search, then categories, then names', async () => {
    session.onJson('GET', '/JSSResource/policies/category/Browsers', { policies: [] });
    session.onJson('GET', '/JSSResource/policies/id/7', {
      policy: { general: { id: 7, name: 'Install Chrome' } },
    });

    await execute(
      options({ policies: true, search: ['Firefox'], category: ['Browsers'], name: ['Install Chrome'] }),
      { print: line => lines.push(line), createSession },
    );

    expect(session.requests.map(r => r.path)).toEqual([
      '/JSSResource/policies',
      '/JSSResource/policies/category/Browsers',
      '/JSSResource/policies',
      '/JSSResource/policies/id/7',
    ]);
  });

  it('ends the session when a job fails', async () => {
    session.onStatuses('GET', '/JSSResource/policies', 500);

    await expect(
      execute(options({ policies: true, search: ['Firefox'] }), { print: () => {}, createSession }),
    ).rejects.toBeInstanceOf(JamfError);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('keeps the job error when ending the session also fails', async () => {
    session.onStatuses('GET', '/JSSResource/policies', 500);
    session.close.mockRejectedValue(
      new JamfError('POST /api/v1/auth/invalidate-token failed: ECONNRESET', { operation: 'send' }),
    );

    await expect(
      execute(options({ policies: true, search: ['Firefox'] }), { print: () => {}, createSession }),
    ).rejects.toThrow('GET /JSSResource/policies returned HTTP 500');
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to end the Jamf session: POST /api/v1/auth/invalidate-token failed: ECONNRESET',
    );
  });

  it('returns the report when only ending the session fails', async () => {
    session.close.mockRejectedValue(new Error('socket hang up'));

    const report = await execute(options({ policies: true, search: ['Firefox'] }), { print: () => {}, createSession });

    expect(report.search?.targets).toEqual([{ id: 42, name: 'Install Firefox' }]);
    expect(logger.warn).toHaveBeenCalledWith('Failed to end the Jamf session: socket hang up');
  });

  it('applies --stale-days and posts to Slack', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-10-19T12:00:00Z'));
    process.env.SLACK_WEBHOOK_URL = 'https://hooks.example.test/services/placeholder';
    session.onJson('GET', '/JSSResource/computers', { computers: [{ id: 1, name: 'mac-01' }] });
    session.onJson('GET', '/JSSResource/computers/id/1', computerDetail(1, 'mac-01', '2026-10-14 12:00:00'));

    const report = await execute(options({ computers: true, all: true, staleDays: '3', slack: true }), {
      print: line => lines.push(line),
      createSession,
    });

    expect(report.computers?.stale.map(entry => entry.id)).toEqual([1]);
    expect(report.computers?.healthScore).toBe('0.00%');
    expect(mockSlackConstructor).toHaveBeenCalledWith('https://hooks.example.test/services/placeholder', 10_000);
    expect(mockPost).toHaveBeenCalledTimes(1);
  });

  it('raises the log level with -v', async () => {
    await execute(options({ policies: true, search: ['Firefox'], verbose: 1 }), { print: () => {}, createSession });
    expect(mockSetLogLevel).toHaveBeenCalledWith('debug');

    await execute(options({ policies: true, search: ['Firefox'] }), { print: () => {}, createSession });
    expect(mockSetLogLevel).toHaveBeenLastCalledWith('info');
  });

  it('saves the run report as JSON', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-hygiene-run-'));
    const savePath = path.join(tmpDir, 'report.json');
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);

    try {
      await execute(options({ policies: true, search: ['Chrome'], save: savePath }), { print: () => {}, createSession });

      const saved: unknown = JSON.parse(fs.readFileSync(savePath, 'utf-8'));
      expect(saved).toEqual({
        jamfUrl: 'https://jamf.example.test',
        search: {
          queries: ['Chrome'],
          targets: [{ id: 7, name: 'Install Chrome' }],
          unmatched: [],
          deletions: [],
        },
      });
      expect(stderr).toHaveBeenCalledWith(`Saved to ${savePath}\n`);
    } finally {
      stderr.mockRestore();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
