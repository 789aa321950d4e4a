import { describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadPolicyFile, parsePolicyDocument } from './policyLoader.js';
import { ALL_RESOURCES, decisionToJson, evaluate, UNKNOWN_INTENT, type RequestContext } from './policyEngine.js';

const policy = loadPolicyFile(fileURLToPath(new URL('../../../config/role_intent_policy.yaml', import.meta.url)));
const KNOWN_INTENTS = [...policy.intents.keys()];

function ctx(role: string | undefined, attributes: Record<string, string> = {}): RequestContext {
  return { role, attributes };
}

function classified(intent: string, confidence = 0.9) {
  return { intent, confidence };
}

describe('Policy evaluator', () => {
  it('denies unknown, empty and absent roles before anything else', () => {
    for (const role of ['contractor', '', undefined, 'Admin']) {
      for (const intent of [...KNOWN_INTENTS, UNKNOWN_INTENT]) {
        const decision = evaluate(
          ctx(role, { org_unit: 'HR', ticket_id: 'INC-1', justification: 'x' }),
          classified(intent),
          policy
        );
        expect(decision.allowed).toBe(false);
        expect(decision.reason).toBe('unknown_role');
      }
    }
  });

  it('denies the unknown intent for every known role', () => {
    for (const role of policy.roles.keys()) {
      const decision = evaluate(ctx(role), classified(UNKNOWN_INTENT, 0.1), policy);
      expect(decision.reason).toBe('unknown_intent');
      expect(decision.allowed).toBe(false);
      expect(decision.resolvedResources.size).toBe(0);
    }
  });

  it('intern asking for payroll hits the explicit deny', () => {
    const decision = evaluate(ctx('intern', { org_unit: 'HR' }), classified('retrieve_hr_payroll'), policy);
    expect(decision).toEqual({
      allowed: false,
      reason: 'explicit_deny',
      intent: 'retrieve_hr_payroll',
      resolvedResources: new Set(),
      breakGlassUsed: false,
    });
  });

  it('lets deny win over allow, including wildcards', () => {
    const custom = parsePolicyDocument({
      intents: { write_code: { resources: ['code'] }, ask_public_policy: {} },
      roles: {
        conflicted: { allow: ['write_code'], deny: ['write_code'] },
        locked: { allow: ['*'], deny: ['*'] },
      },
    });
    expect(evaluate(ctx('conflicted'), classified('write_code'), custom).reason).toBe('explicit_deny');
    expect(evaluate(ctx('locked'), classified('ask_public_policy'), custom).reason).toBe('explicit_deny');
  });

  it('hr_manager in HR gets payroll', () => {
    const decision = evaluate(ctx('hr_manager', { org_unit: 'HR' }), classified('retrieve_hr_payroll'), policy);
    expect(decision.allowed).toBe(true);
    expect(decision.reason).toBe('allow_match');
    expect([...decision.resolvedResources]).toEqual(['hr_payroll']);
    expect(decision.breakGlassUsed).toBe(false);
  });

  it('hr_manager without org_unit is missing the attribute', () => {
    const decision = evaluate(ctx('hr_manager'), classified('retrieve_hr_payroll'), policy);
    expect(decision.allowed).toBe(false);
    expect(decision.reason).toBe('missing_attr:org_unit');
  });

  it('treats a wrong attribute value like a missing one', () => {
    const decision = evaluate(ctx('hr_manager', { org_unit: 'Finance' }), classified('retrieve_hr_payroll'), policy);
    expect(decision.reason).toBe('missing_attr:org_unit');
  });

  it('reports the first failing requirement in declaration order', () => {
    const custom = parsePolicyDocument({
      intents: { regional_payroll: { requires_attr: ['org_unit:HR', 'geo:IN'], resources: ['hr_payroll_in'] } },
      roles: { hr_manager: { allow: ['regional_payroll'] } },
    });
    const intent = classified('regional_payroll');
    expect(evaluate(ctx('hr_manager'), intent, custom).reason).toBe('missing_attr:org_unit');
    expect(evaluate(ctx('hr_manager', { geo: 'IN' }), intent, custom).reason).toBe('missing_attr:org_unit');
    expect(evaluate(ctx('hr_manager', { org_unit: 'HR' }), intent, custom).reason).toBe('missing_attr:geo');
    expect(evaluate(ctx('hr_manager', { org_unit: 'HR', geo: 'US' }), intent, custom).reason).toBe('missing_attr:geo');
    expect(evaluate(ctx('hr_manager', { org_unit: 'HR', geo: 'IN' }), intent, custom).reason).toBe('allow_match');
  });

  it('checks attribute requirements before break-glass and allow', () => {
    const custom = parsePolicyDocument({
      intents: { emergency_export: { break_glass: true, requires_attr: ['geo:IN'], resources: ['*'] } },
      roles: { admin: { allow: ['*'], special: { break_glass_requires: ['ticket_id'] } } },
    });
    const decision = evaluate(ctx('admin', { ticket_id: 'INC-7' }), classified('emergency_export'), custom);
    expect(decision.reason).toBe('missing_attr:geo');
  });

  it('admin with ticket and justification uses break-glass', () => {
    const decision = evaluate(
      ctx('admin', { ticket_id: 'INC-12345', justification: 'finance quarterly close' }),
      classified('admin_override'),
      policy
    );
    expect(decision.allowed).toBe(true);
    expect(decision.reason).toBe('break_glass_allow');
    expect(decision.breakGlassUsed).toBe(true);
    expect([...decision.resolvedResources]).toEqual([ALL_RESOURCES]);
  });

  it('admin without justification is denied break-glass', () => {
    const missing = evaluate(ctx('admin', { ticket_id: 'INC-12345' }), classified('admin_override'), policy);
    expect(missing.allowed).toBe(false);
    expect(missing.reason).toBe('break_glass_missing');
    expect(missing.breakGlassUsed).toBe(false);

    const empty = evaluate(
      ctx('admin', { ticket_id: 'INC-12345', justification: '' }),
      classified('admin_override'),
      policy
    );
    expect(empty.reason).toBe('break_glass_missing');
  });

  it('keeps break-glass intents out of reach for roles that cannot break glass', () => {
    const custom = parsePolicyDocument({
      intents: { admin_override: { resources: ['*'] } },
      roles: {
        ops: { allow: ['admin_override'] },
        everything: { allow: ['*'] },
      },
    });
    const attrs = { ticket_id: 'INC-1', justification: 'outage' };
    expect(evaluate(ctx('ops', attrs), classified('admin_override'), custom).reason).toBe('not_in_allow');
    expect(evaluate(ctx('everything', attrs), classified('admin_override'), custom).reason).toBe('not_in_allow');
    expect(evaluate(ctx('engineer', attrs), classified('admin_override'), policy).reason).toBe('not_in_allow');
  });

  it('allows through the wildcard and denies by default', () => {
    const admin = evaluate(ctx('admin'), classified('write_code'), policy);
    expect(admin.reason).toBe('allow_match');
    expect([...admin.resolvedResources]).toEqual(['code_assistant']);

    const analyst = evaluate(ctx('finance_analyst'), classified('write_code'), policy);
    expect(analyst.allowed).toBe(false);
    expect(analyst.reason).toBe('not_in_allow');
  });

  it('treats an intent missing from the policy as having no requirements', () => {
    const decision = evaluate(ctx('admin'), classified('translate_text'), policy);
    expect(decision.reason).toBe('allow_match');
    expect(decision.resolvedResources.size).toBe(0);
    expect(evaluate(ctx('intern'), classified('translate_text'), policy).reason).toBe('not_in_allow');
  });

  it('returns identical decisions for identical inputs', () => {
    const context = ctx('hr_manager', { org_unit: 'HR', geo: 'IN' });
    const first = evaluate(context, classified('retrieve_hr_payroll', 0.71), policy);
    const second = evaluate(context, classified('retrieve_hr_payroll', 0.71), policy);
    expect(second).toStrictEqual(first);
    expect(JSON.stringify(decisionToJson(second))).toBe(JSON.stringify(decisionToJson(first)));
  });

  it('serializes decisions with sorted resources', () => {
    const custom = parsePolicyDocument({
      intents: { bundle: { resources: ['zeta', 'alpha'] } },
      roles: { reader: { allow: ['bundle'] } },
    });
    expect(decisionToJson(evaluate(ctx('reader'), classified('bundle'), custom))).toEqual({
      allowed: true,
      reason: 'allow_match',
      intent: 'bundle',
      resolved_resources: ['alpha', 'zeta'],
      break_glass_used: false,
    });
  });
});
