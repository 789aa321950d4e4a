import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export type EmbeddingProviderType = "openai" | "none";

function parseEmbeddingProvider(value: string | undefined): EmbeddingProviderType {
  return value === "none" ? "none" : "openai";
}

export const config = {
  port: Number(process.env.ROLEGUARD_PORT || 8000),
  host: process.env.ROLEGUARD_HOST || "127.0.0.1",
  policyPath: process.env.ROLEGUARD_POLICY_PATH || "./config/role_intent_policy.yaml",
  auditPath: process.env.ROLEGUARD_AUDIT_PATH || "./logs/audit.jsonl",
  logLevel: process.env.LOG_LEVEL || "info",

  // Local Ops auth (policy reload endpoint)
  opsLocalApiKey: process.env.OPS_LOCAL_API_KEY || "",

  // ===== Intent classification =====
  // Minimum max-similarity score for a prototype match; below it the intent is "unknown".
  intentThreshold: Number(process.env.ROLEGUARD_INTENT_THRESHOLD || "0.38"),
  // Upper bound on a single embedding call before classification degrades to "unknown".
  embedTimeoutMs: Number(process.env.ROLEGUARD_EMBED_TIMEOUT_MS || "2000"),
  // Keyword fallback that maps "override ... export payroll" style text to admin_override.
  lexicalOverride: process.env.ROLEGUARD_LEXICAL_OVERRIDE === "true",

  embeddingProvider: parseEmbeddingProvider(process.env.ROLEGUARD_EMBEDDING_PROVIDER),
  // Any OpenAI-compatible /v1/embeddings endpoint (OpenAI, or a self-hosted MiniLM server)
  embeddingUrl: process.env.ROLEGUARD_EMBEDDING_URL || "https://api.openai.com/v1/embeddings",
  embeddingModel: process.env.ROLEGUARD_EMBEDDING_MODEL || "text-embedding-3-small",
  openaiApiKey: process.env.OPENAI_API_KEY || "",

  // Identity
  // Role assumed when x-user-role is missing. Empty means no role, which the gate denies as unknown_role.
  defaultRole: process.env.ROLEGUARD_DEFAULT_ROLE || "",
};

export function requireEnv(name: string, value: string) {
  if (!value) {
    throw new Error(`Missing env var: ${name}`);
  }
}

const NumericSettingsSchema = z.object({
  port: z.number().int().min(1).max(65535),
  intentThreshold: z.number().min(0).max(1),
  // 0 disables the bound.
  embedTimeoutMs: z.number().int().min(0)
});

export type NumericSettings = z.infer<typeof NumericSettingsSchema>;

const SETTING_ENV_NAMES: Record<string, string> = {
  port: "ROLEGUARD_PORT",
  intentThreshold: "ROLEGUARD_INTENT_THRESHOLD",
  embedTimeoutMs: "ROLEGUARD_EMBED_TIMEOUT_MS"
};

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Reject numeric settings that did not parse or are out of range. Called
 * before the server starts.
 */
export function checkConfig(settings: NumericSettings = config): void {
  const result = NumericSettingsSchema.safeParse(settings);
  if (result.success) return;
  throw new ConfigError(
    result.error.issues.map((issue) => {
      const key = String(issue.path[0]);
      return `${SETTING_ENV_NAMES[key] ?? key}: ${issue.message}`;
    })
  );
}
