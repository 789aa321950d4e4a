import type { EmbeddingProvider } from "../embeddingProvider.js";
import { normalize } from "../similarity.js";

/**
 * Content words of the built-in prototype table. Each word is one dimension;
 * words outside the list are ignored, so text sharing no word with any
 * prototype embeds to the zero vector.
 */
export const PROTOTYPE_VOCABULARY = [
  // ask_public_policy
  "company", "leave", "policy", "work", "home", "rules", "share", "employee", "handbook", "section", "travel",
  // write_code
  "write", "python", "function", "generate", "code", "sample", "fix", "bug",
  // retrieve_hr_payroll
  "payroll", "data", "salary", "spreadsheet", "compensation", "details", "list", "export", "csv", "download",
  "report", "summary",
  // retrieve_customer_pii
  "customer", "emails", "phone", "numbers", "client", "pii", "dump", "users", "email",
  // ask_metrics_finance
  "quarterly", "revenue", "finance", "kpis", "profit", "margins", "q4", "figures", "financial", "metrics",
  // admin_override
  "ignore", "all", "act", "admin", "override", "root", "access", "request", "bypass", "restrictions", "elevate",
  "administrator", "superuser", "break", "glass", "grant", "privileges", "safety",
];

/**
 * Deterministic bag-of-words embedder for tests.
 */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly calls = { embed: 0, embedBatch: 0 };
  private readonly index: Map<string, number>;
  private readonly dimensions: number;

  constructor(vocabulary: readonly string[] = PROTOTYPE_VOCABULARY) {
    this.index = new Map(vocabulary.map((word, i) => [word, i]));
    this.dimensions = vocabulary.length;
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const i = this.index.get(token);
      if (i !== undefined) vector[i] += 1;
    }
    return normalize(vector);
  }

  async embed(text: string): Promise<number[]> {
    this.calls.embed += 1;
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.embedBatch += 1;
    return texts.map((text) => this.vectorize(text));
  }
}
