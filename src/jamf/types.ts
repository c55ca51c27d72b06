import { z } from 'zod';

export type ObjectKind = 'computer' | 'policy';

const idSchema = z.coerce.number().int();

const namedRefSchema = z.object({
  id: idSchema,
  name: z.string(),
});

export type NamedRef = z.infer<typeof namedRefSchema>;

export const computerListSchema = z.object({
  computers: z.array(namedRefSchema),
});

export const policyListSchema = z.object({
  policies: z.array(namedRefSchema),
});

export const categoryListSchema = z.object({
  categories: z.array(namedRefSchema),
});

export const computerDetailSchema = z.object({
  computer: z.object({
    general: z.object({
      id: idSchema,
      name: z.string(),
      last_contact_time: z.string().nullish(),
      management_status: z
        .object({
          enrolled_via_dep: z.boolean().optional(),
        })
        .partial()
        .optional(),
    }),
    hardware: z
      .object({
        os_version: z.string().optional(),
      })
      .optional(),
  }),
});

export type ComputerDetail = z.infer<typeof computerDetailSchema>['computer'];

export const policyDetailSchema = z.object({
  policy: z.object({
    general: z.object({
      id: idSchema,
      name: z.string(),
      category: z.object({ id: idSchema.optional(), name: z.string().optional() }).optional(),
    }),
    scope: z
      .object({
        computer_groups: z.array(z.object({ name: z.string() })).optional(),
      })
      .optional(),
    package_configuration: z
      .object({
        packages: z.array(z.object({ name: z.string() })).optional(),
      })
      .optional(),
  }),
});

export type PolicyDetail = z.infer<typeof policyDetailSchema>['policy'];

/** One managed device, as the classifier sees it. Never mutated. */
export interface ComputerRecord {
  readonly id: number;
  readonly name: string;
  readonly osVersion: string;
  readonly depEnrolled: boolean | 'unknown';
  /** Raw `YYYY-MM-DD HH:MM:SS` string; parsed during classification. */
  readonly lastContactTime: string;
}

export interface PolicyRecord {
  readonly id: number;
  readonly name: string;
  readonly category?: string;
  readonly scopeGroups: readonly string[];
  readonly packages: readonly string[];
}

export function toComputerRecord(detail: ComputerDetail): ComputerRecord {
  const dep = detail.general.management_status?.enrolled_via_dep;
  return {
    id: detail.general.id,
    name: detail.general.name,
    osVersion: detail.hardware?.os_version ?? 'unknown',
    depEnrolled: dep ?? 'unknown',
    lastContactTime: detail.general.last_contact_time ?? '',
  };
}

export function toPolicyRecord(detail: PolicyDetail): PolicyRecord {
  return {
    id: detail.general.id,
    name: detail.general.name,
    category: detail.general.category?.name,
    scopeGroups: (detail.scope?.computer_groups ?? []).map(group => group.name),
    packages: (detail.package_configuration?.packages ?? []).map(pkg => pkg.name),
  };
}

/** A policy known only from a list endpoint. */
export function toPolicySummary(ref: NamedRef): PolicyRecord {
  return { id: ref.id, name: ref.name, scopeGroups: [], packages: [] };
}
