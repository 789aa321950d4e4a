import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import {
  PolicyFileSchema,
  WILDCARD,
  type IntentRule,
  type IntentRuleInput,
  type PolicyDocument,
  type RoleRule,
  type RoleRuleInput,
} from './policySchema.js';

/** Intent that is break-glass even when the file omits the flag. */
export const LEGACY_BREAK_GLASS_INTENT = 'admin_override';

/**
 * Raised when a policy document cannot be served. Never produced per request:
 * startup aborts and reloads keep the previous document.
 */
export class PolicyConfigError extends Error {
  issues: string[];
  source?: string;

  constructor(message: string, issues: string[], source?: string) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PolicyConfigError';
    this.issues = issues;
    this.source = source;
  }
}

function formatZodIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

function splitRequirement(entry: string): readonly [string, string] {
  const idx = entry.indexOf(':');
  return [entry.slice(0, idx), entry.slice(idx + 1)] as const;
}

function toIntentRule(name: string, input: IntentRuleInput): IntentRule {
  return {
    resources: new Set(input.resources),
    requiresAttributes: input.requires_attr.map(splitRequirement),
    isPII: input.pii,
    isBreakGlass: input.break_glass ?? name === LEGACY_BREAK_GLASS_INTENT,
  };
}

function toRoleRule(input: RoleRuleInput): RoleRule {
  return {
    allow: new Set(input.allow),
    deny: new Set(input.deny),
    breakGlassRequires: [...(input.special?.break_glass_requires ?? [])],
  };
}

function findDanglingReferences(
  roles: Record<string, RoleRuleInput>,
  intents: Record<string, IntentRuleInput>
): string[] {
  const issues: string[] = [];
  for (const [roleName, role] of Object.entries(roles)) {
    for (const list of ['allow', 'deny'] as const) {
      for (const ref of role[list]) {
        if (ref === WILDCARD || Object.hasOwn(intents, ref)) continue;
        issues.push(`roles.${roleName}.${list}: unknown intent "${ref}"`);
      }
    }
  }
  return issues;
}

/**
 * Validate an already-parsed policy object and build the immutable in-memory
 * document used by the evaluator.
 */
export function parsePolicyDocument(raw: unknown, source?: string): PolicyDocument {
  const parsed = PolicyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PolicyConfigError('Invalid policy document', parsed.error.issues.map(formatZodIssue), source);
  }

  const { policy_version, intents, roles } = parsed.data;
  const dangling = findDanglingReferences(roles, intents);
  if (dangling.length > 0) {
    throw new PolicyConfigError('Policy references undefined intents', dangling, source);
  }

  const intentRules = new Map<string, IntentRule>();
  for (const [name, rule] of Object.entries(intents)) {
    intentRules.set(name, toIntentRule(name, rule));
  }
  const roleRules = new Map<string, RoleRule>();
  for (const [name, rule] of Object.entries(roles)) {
    roleRules.set(name, toRoleRule(rule));
  }

  return Object.freeze({
    version: policy_version,
    intents: intentRules,
    roles: roleRules,
  });
}

export function parsePolicyYaml(text: string, source?: string): PolicyDocument {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PolicyConfigError('Policy file is not valid YAML', [message], source);
  }
  return parsePolicyDocument(raw, source);
}

export function loadPolicyFile(policyPath: string): PolicyDocument {
  let text: string;
  try {
    text = readFileSync(policyPath, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PolicyConfigError('Policy file could not be read', [message], policyPath);
  }
  return parsePolicyYaml(text, policyPath);
}
