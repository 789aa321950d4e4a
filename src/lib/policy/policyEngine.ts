import { WILDCARD, type IntentRule, type PolicyDocument, type RoleRule } from './policySchema.js';

/** Intent label the classifier emits when nothing clears the threshold. */
export const UNKNOWN_INTENT = 'unknown';

/**
 * Sentinel kept in `resolvedResources` when an intent grants every resource.
 * It is never expanded into concrete identifiers.
 */
export const ALL_RESOURCES = WILDCARD;

export type ReasonCode =
  | 'unknown_role'
  | 'unknown_intent'
  | 'explicit_deny'
  | `missing_attr:${string}`
  | 'break_glass_missing'
  | 'break_glass_allow'
  | 'allow_match'
  | 'not_in_allow';

export interface RequestContext {
  role?: string;
  /** Keys that are not present are absent, never empty strings. */
  attributes: Readonly<Record<string, string>>;
}

export interface ClassificationResult {
  intent: string;
  /** Similarity of the winning prototype, in [0, 1]. */
  confidence: number;
}

export interface Decision {
  allowed: boolean;
  reason: ReasonCode;
  intent: string;
  resolvedResources: ReadonlySet<string>;
  breakGlassUsed: boolean;
}

const NO_REQUIREMENTS: IntentRule = {
  resources: new Set(),
  requiresAttributes: [],
  isPII: false,
  isBreakGlass: false,
};

function containsOrWildcard(set: ReadonlySet<string>, name: string): boolean {
  return set.has(WILDCARD) || set.has(name);
}

function lookupRole(policy: PolicyDocument, role: string | undefined): RoleRule | undefined {
  if (!role) return undefined;
  return policy.roles.get(role);
}

function attributeValue(attributes: RequestContext['attributes'], key: string): string | undefined {
  return Object.hasOwn(attributes, key) ? attributes[key] : undefined;
}

function deny(intent: string, reason: ReasonCode): Decision {
  return {
    allowed: false,
    reason,
    intent,
    resolvedResources: new Set(),
    breakGlassUsed: false,
  };
}

function allow(intent: string, rule: IntentRule, reason: ReasonCode, breakGlassUsed: boolean): Decision {
  return {
    allowed: true,
    reason,
    intent,
    resolvedResources: new Set(rule.resources),
    breakGlassUsed,
  };
}

/**
 * Evaluate one request against a policy document.
 *
 * Rules are checked in a fixed order and the first one that applies decides:
 * unknown role, unknown intent, explicit deny, attribute requirements,
 * break-glass, allow list, and finally the default deny. Reason codes are
 * aggregated downstream, so the order must not change.
 */
export function evaluate(
  context: RequestContext,
  classification: ClassificationResult,
  policy: PolicyDocument
): Decision {
  const intent = classification.intent;

  const role = lookupRole(policy, context.role);
  if (!role) return deny(intent, 'unknown_role');

  if (intent === UNKNOWN_INTENT) return deny(intent, 'unknown_intent');

  // Deny wins over allow, including "*" on either side.
  if (containsOrWildcard(role.deny, intent)) return deny(intent, 'explicit_deny');

  const rule = policy.intents.get(intent) ?? NO_REQUIREMENTS;
  for (const [key, required] of rule.requiresAttributes) {
    if (attributeValue(context.attributes, key) !== required) {
      return deny(intent, `missing_attr:${key}`);
    }
  }

  if (rule.isBreakGlass) {
    if (role.breakGlassRequires.length === 0) return deny(intent, 'not_in_allow');
    const missing = role.breakGlassRequires.some((key) => !attributeValue(context.attributes, key));
    if (missing) return deny(intent, 'break_glass_missing');
    return allow(intent, rule, 'break_glass_allow', true);
  }

  if (containsOrWildcard(role.allow, intent)) return allow(intent, rule, 'allow_match', false);

  return deny(intent, 'not_in_allow');
}

/**
 * Plain-object form of a decision for JSON responses and audit records.
 * Resources are sorted so equal decisions serialize identically.
 */
export function decisionToJson(decision: Decision): {
  allowed: boolean;
  reason: ReasonCode;
  intent: string;
  resolved_resources: string[];
  break_glass_used: boolean;
} {
  return {
    allowed: decision.allowed,
    reason: decision.reason,
    intent: decision.intent,
    resolved_resources: [...decision.resolvedResources].sort(),
    break_glass_used: decision.breakGlassUsed,
  };
}
