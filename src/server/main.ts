import { checkConfig, config, ConfigError } from "../lib/core/config.js";
import { logger } from "../lib/core/logger.js";
import { JsonlAuditSink } from "../lib/governance/auditLog.js";
import { getEmbeddingProvider } from "../lib/intent/embeddingProvider.js";
import { IntentClassifier } from "../lib/intent/intentClassifier.js";
import { PolicyConfigError } from "../lib/policy/policyLoader.js";
import { PolicyStore } from "../lib/policy/policyStore.js";
import { buildApp } from "./index.js";

/**
 * Load and validate the policy, warm the classifier, and start listening.
 * Rejects with ConfigError on unusable settings and PolicyConfigError when
 * the policy cannot be served.
 */
export async function startServer() {
  checkConfig();
  const policies = PolicyStore.fromFile(config.policyPath);
  logger.info({ policyPath: config.policyPath, version: policies.current().version }, "policy loaded");

  const classifier = new IntentClassifier(getEmbeddingProvider(), {
    threshold: config.intentThreshold,
    timeoutMs: config.embedTimeoutMs,
    lexicalOverride: config.lexicalOverride
  });

  const app = buildApp({
    policies,
    classifier,
    audit: new JsonlAuditSink(config.auditPath),
    logger
  });

  try {
    await classifier.warmup();
  } catch (err) {
    // Requests classify as unknown (and are denied) until the backend recovers.
    logger.warn({ err }, "intent classifier warm-up failed");
  }

  process.on("SIGHUP", () => {
    try {
      policies.reload();
    } catch (err) {
      logger.error({ err, version: policies.current().version }, "policy reload rejected; keeping active policy");
    }
  });

  await app.listen({ port: config.port, host: config.host });
  return app;
}

export async function main(): Promise<void> {
  try {
    await startServer();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, "refusing to start with invalid settings");
    } else if (err instanceof PolicyConfigError) {
      logger.fatal({ issues: err.issues, source: err.source }, "refusing to start with an invalid policy");
    } else {
      logger.fatal({ err }, "server failed to start");
    }
    process.exitCode = 1;
  }
}

void main();
