/**
 * roleguard library
 *
 * Organized into logical modules:
 * - core: config, logging
 * - intent: embedding provider, prototype table, zero-shot classifier
 * - policy: policy schema, loading/validation, evaluator, reloadable store
 * - governance: gate pipeline, audit sinks, PII masking, audit metrics
 * - auth: identity headers → request context, ops key check
 * - providers: downstream LLM
 */

export { config } from './core/config.js';
export { logger, getLogger } from './core/logger.js';

export {
  IntentClassifier,
  EmbeddingTimeoutError,
  DEFAULT_INTENT_THRESHOLD,
  DEFAULT_EMBED_TIMEOUT_MS,
  type IntentClassifierOptions,
  type IntentScore,
} from './intent/intentClassifier.js';
export {
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  getEmbeddingProvider,
  resetEmbeddingProvider,
  type EmbeddingProvider,
  type EmbedOptions,
} from './intent/embeddingProvider.js';
export { INTENT_PROTOTYPES, looksLikeAdminOverride, type IntentPrototypes } from './intent/prototypes.js';
export { cosineSimilarity } from './intent/similarity.js';

export {
  evaluate,
  decisionToJson,
  UNKNOWN_INTENT,
  ALL_RESOURCES,
  type ClassificationResult,
  type Decision,
  type ReasonCode,
  type RequestContext,
} from './policy/policyEngine.js';
export { loadPolicyFile, parsePolicyDocument, parsePolicyYaml, PolicyConfigError } from './policy/policyLoader.js';
export { PolicyStore, type PolicySource } from './policy/policyStore.js';
export { WILDCARD, type IntentRule, type PolicyDocument, type RoleRule } from './policy/policySchema.js';

export { Gate, type GateDeps, type GateOutcome, type GateRequest, type GateTimings, type IntentSource } from './governance/gate.js';
export {
  JsonlAuditSink,
  MemoryAuditSink,
  readAuditEntries,
  readChainLines,
  verifyAuditChain,
  type AuditRecord,
  type AuditSink,
} from './governance/auditLog.js';
export { maskPII } from './governance/redaction.js';
export { summarizeAudit, readAuditFile, AuditFileNotFoundError, percentile, type AuditSummary } from './governance/metrics.js';

export { requestContextFromHeaders, ATTRIBUTE_HEADERS, ROLE_HEADER } from './auth/identity.js';
export { EchoUpstream, type UpstreamLlm } from './providers/upstream.js';
