import type { z } from 'zod';
import { JamfError } from '../errors.js';
import { logger } from '../logger.js';
import type { HttpTransport, JamfResponse } from './transport.js';
import {
  categoryListSchema,
  computerDetailSchema,
  computerListSchema,
  policyDetailSchema,
  policyListSchema,
  toComputerRecord,
  toPolicyRecord,
  toPolicySummary,
  type ComputerRecord,
  type NamedRef,
  type PolicyRecord,
} from './types.js';

const CLASSIC = '/JSSResource';

function isSuccess(response: JamfResponse): boolean {
  return response.statusCode >= 200 && response.statusCode < 300;
}

/**
 * Endpoint-specific reads over the classic API. Every call is one request,
 * issued in program order.
 */
export class RecordFetcher {
  constructor(private readonly transport: HttpTransport) {}

  async listComputers(): Promise<NamedRef[]> {
    const body = await this.get(`${CLASSIC}/computers`, computerListSchema, 'listComputers');
    return body.computers;
  }

  async getComputer(id: number): Promise<ComputerRecord> {
    const body = await this.get(`${CLASSIC}/computers/id/${id}`, computerDetailSchema, 'getComputer');
    return toComputerRecord(body.computer);
  }

  async listPolicies(): Promise<PolicyRecord[]> {
    const body = await this.get(`${CLASSIC}/policies`, policyListSchema, 'listPolicies');
    return body.policies.map(toPolicySummary);
  }

  async getPolicy(id: number): Promise<PolicyRecord> {
    const body = await this.get(`${CLASSIC}/policies/id/${id}`, policyDetailSchema, 'getPolicy');
    return toPolicyRecord(body.policy);
  }

  /** Exact, case-sensitive name lookup. */
  async findPolicyIdByName(name: string): Promise<number | null> {
    const policies = await this.listPolicies();
    return policies.find(policy => policy.name === name)?.id ?? null;
  }

  async listCategories(): Promise<NamedRef[]> {
    const body = await this.get(`${CLASSIC}/categories`, categoryListSchema, 'listCategories');
    return body.categories;
  }

  /** Policies filed under a category; an unknown category yields `[]`. */
  async listPoliciesInCategory(category: string): Promise<PolicyRecord[]> {
    const path = `${CLASSIC}/policies/category/${encodeURIComponent(category)}`;
    const response = await this.transport.send({ method: 'GET', path });
    if (response.statusCode === 404) {
      logger.debug(`Category '${category}' returned 404`);
      return [];
    }
    return this.decode(response, path, policyListSchema, 'listPoliciesInCategory').policies.map(toPolicySummary);
  }

  private async get<S extends z.ZodTypeAny>(path: string, schema: S, operation: string): Promise<z.infer<S>> {
    const response = await this.transport.send({ method: 'GET', path });
    return this.decode(response, path, schema, operation);
  }

  private decode<S extends z.ZodTypeAny>(
    response: JamfResponse,
    path: string,
    schema: S,
    operation: string,
  ): z.infer<S> {
    if (!isSuccess(response)) {
      throw new JamfError(`GET ${path} returned HTTP ${response.statusCode}`, {
        operation,
        status: response.statusCode,
        context: { path },
      });
    }

    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new JamfError(`GET ${path} returned an unexpected body`, {
        operation,
        status: response.statusCode,
        context: { path, issues: parsed.error.issues.slice(0, 5) },
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
