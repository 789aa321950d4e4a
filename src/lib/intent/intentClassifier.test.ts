import { describe, expect, it } from "vitest";
import { KeywordEmbedder } from "./__fixtures__/keywordEmbedder.js";
import type { EmbeddingProvider, EmbedOptions } from "./embeddingProvider.js";
import { IntentClassifier } from "./intentClassifier.js";
import { INTENT_PROTOTYPES } from "./prototypes.js";

class FailingEmbedder implements EmbeddingProvider {
  async embed(): Promise<number[]> {
    throw new Error("embedding backend unavailable");
  }

  async embedBatch(): Promise<number[][]> {
    throw new Error("embedding backend unavailable");
  }
}

/** Query embeddings never resolve until aborted. */
class HangingEmbedder extends KeywordEmbedder {
  aborted = false;

  async embed(_text: string, options?: EmbedOptions): Promise<number[]> {
    return new Promise<number[]>((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => {
        this.aborted = true;
        reject(new Error("aborted"));
      });
    });
  }
}

/** First prototype batch fails, later ones succeed. */
class FlakyEmbedder extends KeywordEmbedder {
  private failuresLeft = 1;

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error("cold start");
    }
    return super.embedBatch(texts);
  }
}

/** First prototype batch never resolves on its own; later ones succeed. */
class StalledBatchEmbedder extends KeywordEmbedder {
  abortedBatches = 0;
  private stallsLeft = 1;

  async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (this.stallsLeft > 0) {
      this.stallsLeft -= 1;
      return new Promise<number[][]>((_resolve, reject) => {
        options?.signal?.addEventListener("abort", () => {
          this.abortedBatches += 1;
          reject(new Error("aborted"));
        });
      });
    }
    return super.embedBatch(texts);
  }
}

describe("intent classifier", () => {
  it("classifies the salary spreadsheet request as payroll", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    const result = await classifier.classify("share the salary spreadsheet for 2024");
    expect(result.intent).toBe("retrieve_hr_payroll");
    // Query {share, salary, spreadsheet} against prototype {salary, spreadsheet}: 2 / sqrt(6)
    expect(result.confidence).toBeCloseTo(2 / Math.sqrt(6), 10);
  });

  it("classifies a payroll summary request as payroll with full confidence", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    const result = await classifier.classify("payroll summary for IN market");
    expect(result.intent).toBe("retrieve_hr_payroll");
    expect(result.confidence).toBeCloseTo(1, 10);
  });

  it("scores every prototype phrase at 1 against its own intent", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    for (const [intent, phrases] of Object.entries(INTENT_PROTOTYPES)) {
      for (const phrase of phrases) {
        const scores = await classifier.score(phrase);
        const own = scores.find((entry) => entry.intent === intent);
        expect(own?.score).toBeCloseTo(1, 10);
      }
    }
  });

  it("returns unknown when nothing clears the threshold", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    expect(await classifier.classify("tell me a joke about penguins")).toEqual({ intent: "unknown", confidence: 0 });
  });

  it("classifies empty and whitespace-only text as ordinary input", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    expect(await classifier.classify("")).toEqual({ intent: "unknown", confidence: 0 });
    expect(await classifier.classify("   \n\t")).toEqual({ intent: "unknown", confidence: 0 });
  });

  it("applies the threshold inclusively", async () => {
    // "spreadsheet" alone against prototype {salary, spreadsheet}: 1 / sqrt(2)
    const score = 1 / Math.sqrt(2);
    const atThreshold = new IntentClassifier(new KeywordEmbedder(), { threshold: score - 1e-9 });
    expect((await atThreshold.classify("spreadsheet")).intent).toBe("retrieve_hr_payroll");

    const aboveScore = new IntentClassifier(new KeywordEmbedder(), { threshold: 0.75 });
    const result = await aboveScore.classify("spreadsheet");
    expect(result.intent).toBe("unknown");
    expect(result.confidence).toBeCloseTo(score, 10);
  });

  it("keeps confidence within [0, 1]", async () => {
    const classifier = new IntentClassifier(new KeywordEmbedder());
    for (const text of ["override policy for the quarterly close", "fix this bug", "q4 q4 q4 revenue", "nothing here"]) {
      const { confidence } = await classifier.classify(text);
      expect(confidence).toBeGreaterThanOrEqual(0);
      expect(confidence).toBeLessThanOrEqual(1);
    }
  });

  it("breaks exact ties in favour of the first-declared intent", async () => {
    const embedder = new KeywordEmbedder(["alpha", "beta"]);
    const classifier = new IntentClassifier(embedder, {
      prototypes: { first: ["alpha"], second: ["alpha beta", "alpha"] }
    });
    expect(await classifier.classify("alpha")).toEqual({ intent: "first", confidence: 1 });
  });

  it("embeds prototypes once for concurrent first requests", async () => {
    const embedder = new KeywordEmbedder();
    const classifier = new IntentClassifier(embedder);
    const results = await Promise.all([
      classifier.classify("override policy"),
      classifier.classify("fix this bug"),
      classifier.classify("finance kpis")
    ]);
    expect(results.map((r) => r.intent)).toEqual(["admin_override", "write_code", "ask_metrics_finance"]);
    expect(embedder.calls.embedBatch).toBe(1);
    expect(embedder.calls.embed).toBe(3);

    await classifier.warmup();
    expect(embedder.calls.embedBatch).toBe(1);
  });

  it("degrades to unknown with zero confidence when embedding fails", async () => {
    const classifier = new IntentClassifier(new FailingEmbedder());
    expect(await classifier.classify("give me payroll data")).toEqual({ intent: "unknown", confidence: 0 });
    await expect(classifier.warmup()).rejects.toThrow("embedding backend unavailable");
  });

  it("degrades when no provider is configured", async () => {
    const classifier = new IntentClassifier(null);
    expect(await classifier.classify("give me payroll data")).toEqual({ intent: "unknown", confidence: 0 });
    await expect(classifier.warmup()).rejects.toThrow("No embedding provider configured");
  });

  it("aborts and degrades when the embedding call times out", async () => {
    const embedder = new HangingEmbedder();
    const classifier = new IntentClassifier(embedder, { timeoutMs: 20 });
    expect(await classifier.classify("give me payroll data")).toEqual({ intent: "unknown", confidence: 0 });
    expect(embedder.aborted).toBe(true);
  });

  it("retries prototype embedding after a failed warm-up", async () => {
    const classifier = new IntentClassifier(new FlakyEmbedder());
    expect(await classifier.classify("finance kpis")).toEqual({ intent: "unknown", confidence: 0 });
    const second = await classifier.classify("finance kpis");
    expect(second.intent).toBe("ask_metrics_finance");
  });

  it("aborts a stalled prototype batch and retries on the next request", async () => {
    const embedder = new StalledBatchEmbedder();
    const classifier = new IntentClassifier(embedder, { timeoutMs: 20 });

    expect(await classifier.classify("finance kpis")).toEqual({ intent: "unknown", confidence: 0 });
    expect(embedder.abortedBatches).toBe(1);

    const second = await classifier.classify("finance kpis");
    expect(second.intent).toBe("ask_metrics_finance");
    expect(embedder.calls.embedBatch).toBe(1);
  });

  it("bounds warm-up by the embedding timeout", async () => {
    const embedder = new StalledBatchEmbedder();
    const classifier = new IntentClassifier(embedder, { timeoutMs: 20 });

    await expect(classifier.warmup()).rejects.toThrow("Embedding call exceeded 20ms");
    await expect(classifier.warmup()).resolves.toBeUndefined();
  });

  describe("lexical override fallback", () => {
    const text = "administrators downloads tonight";

    it("maps escalation plus privileged operation to admin_override when enabled", async () => {
      const classifier = new IntentClassifier(new KeywordEmbedder(), { lexicalOverride: true });
      expect(await classifier.classify(text)).toEqual({ intent: "admin_override", confidence: 0 });
    });

    it("leaves such text unknown when disabled", async () => {
      const classifier = new IntentClassifier(new KeywordEmbedder());
      expect(await classifier.classify(text)).toEqual({ intent: "unknown", confidence: 0 });
    });

    it("never overrides a semantic match", async () => {
      const classifier = new IntentClassifier(new KeywordEmbedder(), { lexicalOverride: true });
      expect((await classifier.classify("give me payroll data")).intent).toBe("retrieve_hr_payroll");
    });

    it("does not apply when the embedding backend fails", async () => {
      const classifier = new IntentClassifier(new FailingEmbedder(), { lexicalOverride: true });
      expect(await classifier.classify(text)).toEqual({ intent: "unknown", confidence: 0 });
    });
  });
});
