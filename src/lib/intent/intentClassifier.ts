import { getLogger } from "../core/logger.js";
import { UNKNOWN_INTENT, type ClassificationResult } from "../policy/policyEngine.js";
import type { EmbeddingProvider } from "./embeddingProvider.js";
import {
  INTENT_PROTOTYPES,
  LEXICAL_OVERRIDE_INTENT,
  looksLikeAdminOverride,
  type IntentPrototypes
} from "./prototypes.js";
import { clampUnit, cosineSimilarity, normalize } from "./similarity.js";

const log = getLogger("intentClassifier");

export const DEFAULT_INTENT_THRESHOLD = 0.38;
export const DEFAULT_EMBED_TIMEOUT_MS = 2000;

export interface IntentClassifierOptions {
  /** Scores strictly below this classify as "unknown". */
  threshold?: number;
  /** Bound on each embedding wait; 0 or less disables it. */
  timeoutMs?: number;
  /** Map escalation + privileged-operation wording to admin_override when nothing else matches. */
  lexicalOverride?: boolean;
  prototypes?: IntentPrototypes;
}

interface PrototypeEmbeddings {
  intent: string;
  vectors: number[][];
}

export interface IntentScore {
  intent: string;
  score: number;
}

export class EmbeddingTimeoutError extends Error {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Embedding call exceeded ${timeoutMs}ms`);
    this.name = "EmbeddingTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

const DEGRADED: ClassificationResult = { intent: UNKNOWN_INTENT, confidence: 0 };

function raceTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout?: () => void): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new EmbeddingTimeoutError(timeoutMs));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Zero-shot intent classifier: nearest prototype phrase in embedding space.
 *
 * Prototype embeddings are computed once and shared by every caller; the
 * first `classify` (or `warmup`) starts the computation and concurrent callers
 * await the same promise. `classify` never rejects: embedding failures and
 * timeouts classify as "unknown" with confidence 0.
 */
export class IntentClassifier {
  private readonly provider: EmbeddingProvider | null;
  private readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly lexicalOverride: boolean;
  private readonly prototypes: IntentPrototypes;
  private prototypeEmbeddings: Promise<PrototypeEmbeddings[]> | null = null;

  constructor(provider: EmbeddingProvider | null, options: IntentClassifierOptions = {}) {
    this.provider = provider;
    this.threshold = options.threshold ?? DEFAULT_INTENT_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
    this.lexicalOverride = options.lexicalOverride ?? false;
    this.prototypes = options.prototypes ?? INTENT_PROTOTYPES;
  }

  get intents(): string[] {
    return Object.keys(this.prototypes);
  }

  /**
   * Compute prototype embeddings ahead of traffic. Rejects when the embedding
   * backend is unavailable, which readiness checks surface.
   */
  async warmup(): Promise<void> {
    await this.loadPrototypes();
  }

  private loadPrototypes(): Promise<PrototypeEmbeddings[]> {
    if (this.prototypeEmbeddings) return this.prototypeEmbeddings;
    const provider = this.provider;
    if (!provider) {
      return Promise.reject(new Error("No embedding provider configured"));
    }

    // Bounded like query embeddings; a hung batch is aborted and forgotten.
    const controller = new AbortController();
    const pending = raceTimeout(this.embedPrototypes(provider, controller.signal), this.timeoutMs, () =>
      controller.abort()
    );
    this.prototypeEmbeddings = pending;
    // Let the next caller retry after a failed or timed-out warm-up.
    pending.catch(() => {
      if (this.prototypeEmbeddings === pending) this.prototypeEmbeddings = null;
    });
    return pending;
  }

  private async embedPrototypes(provider: EmbeddingProvider, signal: AbortSignal): Promise<PrototypeEmbeddings[]> {
    const entries = Object.entries(this.prototypes);
    const phrases = entries.flatMap(([, examples]) => [...examples]);
    const vectors = await provider.embedBatch(phrases, { signal });
    if (vectors.length !== phrases.length) {
      throw new Error(`Expected ${phrases.length} prototype embeddings, got ${vectors.length}`);
    }

    let offset = 0;
    const result = entries.map(([intent, examples]) => {
      const slice = vectors.slice(offset, offset + examples.length).map(normalize);
      offset += examples.length;
      return { intent, vectors: slice };
    });
    log.info({ intents: result.length, phrases: phrases.length }, "prototype embeddings ready");
    return result;
  }

  private async embedQuery(provider: EmbeddingProvider, text: string): Promise<number[]> {
    const controller = new AbortController();
    const vector = await raceTimeout(
      provider.embed(text, { signal: controller.signal }),
      this.timeoutMs,
      () => controller.abort()
    );
    return normalize(vector);
  }

  /**
   * Max similarity per intent, in prototype declaration order.
   */
  async score(text: string): Promise<IntentScore[]> {
    const provider = this.provider;
    if (!provider) {
      throw new Error("No embedding provider configured");
    }
    const [prototypes, query] = await Promise.all([
      this.loadPrototypes(),
      this.embedQuery(provider, text)
    ]);

    return prototypes.map(({ intent, vectors }) => ({
      intent,
      score: vectors.reduce((best, vector) => Math.max(best, cosineSimilarity(query, vector)), -Infinity)
    }));
  }

  async classify(text: string): Promise<ClassificationResult> {
    let scores: IntentScore[];
    try {
      scores = await this.score(text);
    } catch (err) {
      log.warn({ err }, "intent classification degraded to unknown");
      return { ...DEGRADED };
    }

    // Strict ">" keeps the first-declared intent on an exact tie.
    let best: IntentScore | null = null;
    for (const candidate of scores) {
      if (!best || candidate.score > best.score) best = candidate;
    }
    if (!best) return { ...DEGRADED };

    const confidence = clampUnit(best.score);
    if (confidence >= this.threshold) {
      return { intent: best.intent, confidence };
    }

    if (this.lexicalOverride && this.prototypes[LEXICAL_OVERRIDE_INTENT] && looksLikeAdminOverride(text)) {
      return { intent: LEXICAL_OVERRIDE_INTENT, confidence };
    }

    return { intent: UNKNOWN_INTENT, confidence };
  }
}
