import { z } from 'zod';

/** Literal used in allow/deny lists and resource lists to mean "everything". */
export const WILDCARD = '*';

const NameSchema = z.string().min(1);

/**
 * "key:value" requirement, split on the first colon. The value may itself
 * contain colons (e.g. "ticket_id:INC:1").
 */
export const RequiredAttributeSchema = z
  .string()
  .regex(/^[^:]+:/, { message: 'requires_attr entries must look like "key:value"' });

export const IntentRuleSchema = z
  .object({
    resources: z.array(NameSchema).default([]),
    requires_attr: z.array(RequiredAttributeSchema).default([]),
    pii: z.boolean().default(false),
    break_glass: z.boolean().optional(),
  })
  .passthrough();

export const RoleRuleSchema = z
  .object({
    allow: z.array(NameSchema).default([]),
    deny: z.array(NameSchema).default([]),
    special: z
      .object({
        break_glass_requires: z.array(NameSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const PolicyFileSchema = z.object({
  policy_version: z.union([z.string(), z.number()]).transform(String).default('unversioned'),
  // A bare `name:` entry in YAML parses as null and means "no constraints".
  intents: z.record(NameSchema, z.preprocess((rule) => rule ?? {}, IntentRuleSchema)),
  roles: z.record(NameSchema, z.preprocess((rule) => rule ?? {}, RoleRuleSchema)),
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;
export type IntentRuleInput = z.infer<typeof IntentRuleSchema>;
export type RoleRuleInput = z.infer<typeof RoleRuleSchema>;

// ============================================================================
// In-memory document
// ============================================================================

export interface IntentRule {
  resources: ReadonlySet<string>;
  /** Checked in order; the first failing key names the deny reason. */
  requiresAttributes: ReadonlyArray<readonly [key: string, value: string]>;
  isPII: boolean;
  isBreakGlass: boolean;
}

export interface RoleRule {
  allow: ReadonlySet<string>;
  deny: ReadonlySet<string>;
  /** Empty when the role cannot use break-glass intents at all. */
  breakGlassRequires: readonly string[];
}

export interface PolicyDocument {
  version: string;
  intents: ReadonlyMap<string, IntentRule>;
  roles: ReadonlyMap<string, RoleRule>;
}
