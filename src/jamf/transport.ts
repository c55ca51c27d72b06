import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { logger } from '../logger.js';
import { JamfError, toError } from '../errors.js';
import { encodeCredentials } from '../config.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RequestBody = string | FormData | Record<string, unknown>;

export interface JamfRequest {
  method: HttpMethod;
  /** Path relative to the server URL, e.g. `/JSSResource/policies`. */
  path: string;
  body?: RequestBody;
}

export interface JamfResponse {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  /** Parsed JSON when the server answered with JSON, raw text otherwise. */
  readonly body: unknown;
}

/** The capability the fetcher and the delete orchestrator depend on. */
export interface HttpTransport {
  send(request: JamfRequest): Promise<JamfResponse>;
}

export interface JamfTransportOptions {
  url: string;
  username: string;
  password: string;
  timeoutMs?: number;
  verbosity?: number;
}

const MODERN_API_PATTERN = /(^|\/)(api|uapi)\//;
const TOKEN_PATH_PATTERN = /\/auth\/tokens?$/;
const SESSION_COOKIE = 'APBALANCEID';
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const DEFAULT_TOKEN_LIFETIME_MS = 20 * 60_000;

export const TOKEN_PATH = '/api/v1/auth/token';
export const INVALIDATE_TOKEN_PATH = '/api/v1/auth/invalidate-token';
export const VERSION_PATH = '/api/v1/jamf-pro-version';

const tokenSchema = z.object({
  token: z.string().min(1),
  expires: z.string().optional(),
});

const versionSchema = z.object({
  version: z.string(),
});

export function isModernApiPath(path: string): boolean {
  return MODERN_API_PATTERN.test(path);
}

/**
 * Modern API paths take a Bearer token, except the token endpoint itself,
 * which is where the token comes from. Everything else is Basic.
 */
export function selectAuthScheme(path: string): 'Basic' | 'Bearer' {
  return isModernApiPath(path) && !TOKEN_PATH_PATTERN.test(path) ? 'Bearer' : 'Basic';
}

export function selectContentHeaders(method: HttpMethod, path: string): Record<string, string> {
  if (method === 'GET' || method === 'DELETE') {
    return { Accept: 'application/json' };
  }
  if (method === 'POST' && path.includes('fileuploads')) {
    return { 'Content-Type': 'multipart/form-data' };
  }
  if (isModernApiPath(path)) {
    return { 'Content-Type': 'application/json', Accept: 'application/json' };
  }
  return { 'Content-Type': 'application/xml' };
}

export function extractSessionCookie(setCookie: unknown): string | null {
  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  for (const value of values) {
    if (typeof value !== 'string') continue;
    const pair = value.split(';')[0].trim();
    if (pair.startsWith(`${SESSION_COOKIE}=`)) return pair;
  }
  return null;
}

function normalizeHeaders(raw: object): Record<string, string> {
  const headers: Record<string, string> = {};
  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    if (value === undefined || value === null) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return headers;
}

function parseBody(contentType: string | undefined, data: unknown): unknown {
  if (typeof data !== 'string') return data;
  if (!contentType?.includes('json') || data.trim() === '') return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

export function toJamfResponse(status: number, rawHeaders: object, data: unknown): JamfResponse {
  const headers = normalizeHeaders(rawHeaders);
  return Object.freeze({
    statusCode: status,
    headers: Object.freeze(headers),
    body: parseBody(headers['content-type'], data),
  });
}

interface BearerToken {
  token: string;
  expiresAt: number;
}

/**
 * Jamf Pro HTTP client. Owns the session state of one run: the sticky
 * load-balancer cookie and the Bearer token for the modern API.
 */
export class JamfTransport implements HttpTransport {
  private readonly http: AxiosInstance;
  private readonly basicCredentials: string;
  private readonly verbosity: number;
  private sessionCookie: string | null = null;
  private bearer: BearerToken | null = null;

  constructor(options: JamfTransportOptions) {
    this.basicCredentials = encodeCredentials(options.username, options.password);
    this.verbosity = options.verbosity ?? 0;
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs ?? 30_000,
    });
  }

  getSessionCookie(): string | null {
    return this.sessionCookie;
  }

  async send(request: JamfRequest): Promise<JamfResponse> {
    const authorization = selectAuthScheme(request.path) === 'Bearer'
      ? `Bearer ${await this.getBearerToken()}`
      : `Basic ${this.basicCredentials}`;
    return this.dispatch(request, authorization);
  }

  /** Connectivity check against the modern API; returns the server version. */
  async ping(): Promise<string> {
    const response = await this.send({ method: 'GET', path: VERSION_PATH });
    const parsed = versionSchema.safeParse(response.body);
    if (response.statusCode !== 200 || !parsed.success) {
      throw new JamfError(`Version check failed with HTTP ${response.statusCode}`, {
        operation: 'ping',
        status: response.statusCode,
      });
    }
    return parsed.data.version;
  }

  /** Invalidate the Bearer token if one was issued during this run. */
  async close(): Promise<void> {
    if (!this.bearer) return;
    const token = this.bearer.token;
    this.bearer = null;
    const response = await this.dispatch(
      { method: 'POST', path: INVALIDATE_TOKEN_PATH },
      `Bearer ${token}`,
    );
    if (response.statusCode !== 204 && response.statusCode !== 200) {
      logger.warn(`Token invalidation returned HTTP ${response.statusCode}`);
    }
  }

  private async getBearerToken(): Promise<string> {
    if (this.bearer && Date.now() < this.bearer.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
      return this.bearer.token;
    }

    const response = await this.dispatch(
      { method: 'POST', path: TOKEN_PATH },
      `Basic ${this.basicCredentials}`,
    );
    const parsed = tokenSchema.safeParse(response.body);
    if (response.statusCode !== 200 || !parsed.success) {
      throw new JamfError(`Token request failed with HTTP ${response.statusCode}`, {
        operation: 'getBearerToken',
        status: response.statusCode,
      });
    }

    const expires = parsed.data.expires ? Date.parse(parsed.data.expires) : NaN;
    this.bearer = {
      token: parsed.data.token,
      expiresAt: Number.isNaN(expires) ? Date.now() + DEFAULT_TOKEN_LIFETIME_MS : expires,
    };
    logger.debug('Obtained Bearer token');
    return this.bearer.token;
  }

  private async dispatch(request: JamfRequest, authorization: string): Promise<JamfResponse> {
    const headers: Record<string, string> = {
      Authorization: authorization,
      ...selectContentHeaders(request.method, request.path),
    };
    if (this.sessionCookie) {
      headers.Cookie = this.sessionCookie;
    }

    logger.debug(`${request.method} ${request.path}`, this.sessionCookie ? { session: this.sessionCookie } : undefined);

    let response: AxiosResponse<string>;
    try {
      response = await this.http.request<string>({
        method: request.method,
        url: request.path,
        headers,
        data: request.body,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (err) {
      const cause = toError(err);
      throw new JamfError(`${request.method} ${request.path} failed: ${cause.message}`, {
        operation: 'send',
        context: { method: request.method, path: request.path },
        cause,
      });
    }

    const cookie = extractSessionCookie(response.headers['set-cookie']);
    if (cookie && cookie !== this.sessionCookie) {
      logger.debug(this.sessionCookie ? 'Session cookie replaced' : 'Session cookie captured', { session: cookie });
      this.sessionCookie = cookie;
    }

    const result = toJamfResponse(response.status, response.headers, response.data);
    if (this.verbosity > 1) {
      logger.debug(`HTTP ${result.statusCode} ${request.method} ${request.path}`, { headers: result.headers });
    }
    return result;
  }
}
