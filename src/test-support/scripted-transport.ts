import type { HttpTransport, JamfRequest, JamfResponse } from '../jamf/transport.js';
import { toJamfResponse } from '../jamf/transport.js';

type Scripted = JamfResponse | Error;

/**
 * In-process stand-in for the Jamf server. Responses are queued per
 * `METHOD path`; the last queued response repeats once the queue drains.
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: JamfRequest[] = [];
  private readonly routes = new Map<string, Scripted[]>();

  on(method: JamfRequest['method'], path: string, ...responses: Scripted[]): this {
    this.routes.set(`${method} ${path}`, responses);
    return this;
  }

  onJson(method: JamfRequest['method'], path: string, body: unknown, status = 200): this {
    return this.on(method, path, jsonResponse(status, body));
  }

  onStatuses(method: JamfRequest['method'], path: string, ...statuses: number[]): this {
    return this.on(method, path, ...statuses.map(status => statusResponse(status)));
  }

  count(method: JamfRequest['method'], path: string): number {
    return this.requests.filter(r => r.method === method && r.path === path).length;
  }

  async send(request: JamfRequest): Promise<JamfResponse> {
    this.requests.push(request);
    const queue = this.routes.get(`${request.method} ${request.path}`);
    if (!queue || queue.length === 0) {
      return statusResponse(404);
    }
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next instanceof Error) throw next;
    return next ?? statusResponse(404);
  }
}

export function jsonResponse(status: number, body: unknown): JamfResponse {
  return toJamfResponse(status, { 'content-type': 'application/json' }, JSON.stringify(body));
}

export function statusResponse(status: number): JamfResponse {
  return toJamfResponse(status, { 'content-type': 'text/html' }, '');
}

export function computerDetail(
  id: number,
  name: string,
  lastContactTime: string,
  osVersion = '14.5.0',
  dep = true,
): unknown {
  return {
    computer: {
      general: {
        id,
        name,
        last_contact_time: lastContactTime,
        management_status: { enrolled_via_dep: dep },
      },
      hardware: { os_version: osVersion },
    },
  };
}
