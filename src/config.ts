import * as fs from 'node:fs';
import { z } from 'zod';
import 'dotenv/config';
import { ConfigError, toError } from './errors.js';
import { fetchSecrets } from './secrets.js';

const configSchema = z.object({
  jamf: z.object({
    url: z.string().url().transform(url => url.replace(/\/+$/, '')),
    username: z.string().min(1),
    password: z.string().min(1),
    timeoutMs: z.number().int().positive().default(30_000),
  }),
  slack: z.object({
    webhookUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(10_000),
  }),
  classification: z.object({
    staleThresholdDays: z.number().int().nonnegative().default(10),
  }),
  delete: z.object({
    maxAttempts: z.number().int().positive().default(5),
    retryDelayMs: z.number().int().nonnegative().default(30_000),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/** AutoPkg-style preferences file, as JSON. */
const prefsSchema = z.object({
  JSS_URL: z.string().optional(),
  API_USERNAME: z.string().optional(),
  API_PASSWORD: z.string().optional(),
  SLACK_WEBHOOK: z.string().optional(),
});

export interface ConfigOverrides {
  url?: string;
  user?: string;
  password?: string;
  prefsPath?: string;
  staleThresholdDays?: number;
}

function toNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function buildEnvMap(env: Record<string, string | undefined>): Record<string, unknown> {
  return {
    jamf: {
      url: env.JAMF_URL || undefined,
      username: env.JAMF_USERNAME || undefined,
      password: env.JAMF_PASSWORD || undefined,
      timeoutMs: toNumber(env.JAMF_TIMEOUT_MS),
    },
    slack: {
      webhookUrl: env.SLACK_WEBHOOK_URL || undefined,
      timeoutMs: toNumber(env.SLACK_TIMEOUT_MS),
    },
    classification: {
      staleThresholdDays: toNumber(env.STALE_THRESHOLD_DAYS),
    },
    delete: {
      maxAttempts: toNumber(env.DELETE_MAX_ATTEMPTS),
      retryDelayMs: toNumber(env.DELETE_RETRY_DELAY_MS),
    },
    logLevel: env.LOG_LEVEL || undefined,
  };
}

export function readPrefsFile(prefsPath: string): Record<string, string | undefined> {
  let raw: string;
  try {
    raw = fs.readFileSync(prefsPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read prefs file: ${prefsPath}`, {
      context: { prefsPath },
      cause: toError(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError('Prefs file contains invalid JSON', {
      context: { prefsPath },
      cause: toError(err),
    });
  }

  const result = prefsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError('Prefs file has an unexpected shape', {
      context: { prefsPath },
      cause: result.error,
    });
  }

  const prefs = result.data;
  return {
    JAMF_URL: prefs.JSS_URL,
    JAMF_USERNAME: prefs.API_USERNAME,
    JAMF_PASSWORD: prefs.API_PASSWORD,
    SLACK_WEBHOOK_URL: prefs.SLACK_WEBHOOK,
  };
}

function withoutEmpty(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value) out[key] = value;
  }
  return out;
}

function parseConfig(env: Record<string, string | undefined>): Config {
  try {
    return configSchema.parse(buildEnvMap(env));
  } catch (err) {
    throw new ConfigError('Invalid configuration', {
      cause: toError(err),
    });
  }
}

/**
 * Resolve configuration from the environment, an optional AWS secret, an
 * optional prefs file and CLI overrides, later sources winning.
 */
export async function loadConfig(overrides: ConfigOverrides = {}): Promise<Config> {
  let env: Record<string, string | undefined> = { ...process.env };

  const secretName = process.env.AWS_SECRET_NAME;
  if (secretName) {
    const secrets = await fetchSecrets(secretName, process.env.AWS_REGION);
    env = { ...env, ...secrets };
  }

  if (overrides.prefsPath) {
    env = { ...env, ...withoutEmpty(readPrefsFile(overrides.prefsPath)) };
  }

  env = {
    ...env,
    ...withoutEmpty({
      JAMF_URL: overrides.url,
      JAMF_USERNAME: overrides.user,
      JAMF_PASSWORD: overrides.password,
      STALE_THRESHOLD_DAYS:
        overrides.staleThresholdDays === undefined ? undefined : String(overrides.staleThresholdDays),
    }),
  };

  return parseConfig(env);
}

export function requireWebhook(config: Config): string {
  if (!config.slack.webhookUrl) {
    throw new ConfigError('Slack webhook URL is not configured. Set SLACK_WEBHOOK_URL or SLACK_WEBHOOK in the prefs file.', {
      context: { setting: 'slack.webhookUrl' },
    });
  }
  return config.slack.webhookUrl;
}

export function encodeCredentials(username: string, password: string): string {
  return Buffer.from(`${username}:${password}`).toString('base64');
}
