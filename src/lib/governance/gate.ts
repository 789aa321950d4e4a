import { performance } from 'node:perf_hooks';
import { getLogger } from '../core/logger.js';
import {
  evaluate,
  type ClassificationResult,
  type Decision,
  type RequestContext,
} from '../policy/policyEngine.js';
import type { PolicyStore } from '../policy/policyStore.js';
import type { AuditRecord, AuditSink } from './auditLog.js';
import { maskAttributes, maskPII } from './redaction.js';

const log = getLogger('gate');

export interface IntentSource {
  classify(text: string): Promise<ClassificationResult>;
}

export interface GateDeps {
  classifier: IntentSource;
  policies: PolicyStore;
  audit: AuditSink;
  /** Millisecond clock; defaults to `performance.now`. */
  clock?: () => number;
}

export interface GateRequest {
  requestId: string;
  text: string;
  context: RequestContext;
}

export interface GateTimings {
  classifyMs: number;
  evaluateMs: number;
  totalMs: number;
}

export interface GateOutcome {
  decision: Decision;
  classification: ClassificationResult;
  timings: GateTimings;
  policyVersion: string;
  auditRecord: AuditRecord;
}

function roundMs(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Runs classification then policy evaluation for one request and writes the
 * audit record. Every outcome is a decision; only the audit write can fail,
 * and that failure is logged without changing the decision.
 */
export class Gate {
  private readonly deps: GateDeps;
  private readonly clock: () => number;

  constructor(deps: GateDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => performance.now());
  }

  async check(request: GateRequest): Promise<GateOutcome> {
    // Captured once; a concurrent reload does not affect this request.
    const policy = this.deps.policies.current();

    const started = this.clock();
    const classification = await this.deps.classifier.classify(request.text);
    const classified = this.clock();
    const decision = evaluate(request.context, classification, policy);
    const evaluated = this.clock();

    const timings: GateTimings = {
      classifyMs: roundMs(classified - started),
      evaluateMs: roundMs(evaluated - classified),
      totalMs: roundMs(evaluated - started),
    };

    const auditRecord: AuditRecord = {
      request_id: request.requestId,
      ts: new Date().toISOString(),
      role: request.context.role ?? null,
      attrs: maskAttributes(request.context.attributes),
      intent: { intent: classification.intent, confidence: classification.confidence },
      allowed: decision.allowed,
      reason: maskPII(decision.reason),
      resources: [...decision.resolvedResources].sort(),
      break_glass: decision.breakGlassUsed,
      t_intent_ms: timings.classifyMs,
      t_policy_ms: timings.evaluateMs,
      latency_ms: timings.totalMs,
      prompt_chars: request.text.length,
      policy_version: policy.version,
    };

    try {
      await this.deps.audit.append(auditRecord);
    } catch (err) {
      log.error({ err, requestId: request.requestId }, 'audit append failed');
    }

    log.debug(
      {
        requestId: request.requestId,
        role: auditRecord.role,
        intent: classification.intent,
        allowed: decision.allowed,
        reason: decision.reason,
      },
      'gate decision'
    );

    return {
      decision,
      classification,
      timings,
      policyVersion: policy.version,
      auditRecord,
    };
  }
}
