#!/usr/bin/env node
/**
 * roleguard CLI
 *
 * Operator utilities around the guardrail: start the server, validate a
 * policy file before deploying it, dry-run a decision, and summarize or
 * verify an audit log.
 */
import { Command } from "commander";
import { parseAttributePairs } from "./lib/auth/identity.js";
import { config } from "./lib/core/config.js";
import { readAuditEntries, verifyAuditChain } from "./lib/governance/auditLog.js";
import { AuditFileNotFoundError, readAuditFile, summarizeAudit } from "./lib/governance/metrics.js";
import { decisionToJson, evaluate } from "./lib/policy/policyEngine.js";
import { loadPolicyFile, PolicyConfigError } from "./lib/policy/policyLoader.js";

function reportPolicyError(err: unknown): void {
  if (err instanceof PolicyConfigError) {
    console.error(`Invalid policy${err.source ? ` (${err.source})` : ""}:`);
    err.issues.forEach((issue) => console.error("  ", issue));
    process.exitCode = 1;
    return;
  }
  throw err;
}

const program = new Command();

program.name("roleguard").description("Role-first guardrail for LLM chat endpoints").version("0.1.0");

program
  .command("serve")
  .description("Start the guardrail HTTP server")
  .action(async () => {
    await import("./server/main.js");
  });

program
  .command("check-policy [path]")
  .description("Validate a policy file (default: ROLEGUARD_POLICY_PATH)")
  .action((path?: string) => {
    try {
      const policy = loadPolicyFile(path || config.policyPath);
      console.log(
        `Policy OK: version ${policy.version}, ${policy.intents.size} intents, ${policy.roles.size} roles`
      );
    } catch (err) {
      reportPolicyError(err);
    }
  });

program
  .command("evaluate")
  .description("Evaluate a role/intent pair against the policy without classifying text")
  .requiredOption("--intent <intent>", "Classified intent")
  .option("--role <role>", "Requesting role")
  .option("--attr <key=value...>", "Request attribute (repeatable)", [])
  .option("--policy <path>", "Policy file", config.policyPath)
  .action((opts: { intent: string; role?: string; attr: string[]; policy: string }) => {
    try {
      const policy = loadPolicyFile(opts.policy);
      const decision = evaluate(
        { role: opts.role, attributes: parseAttributePairs(opts.attr) },
        { intent: opts.intent, confidence: 1 },
        policy
      );
      console.log(JSON.stringify({ policy_version: policy.version, ...decisionToJson(decision) }, null, 2));
    } catch (err) {
      reportPolicyError(err);
    }
  });

program
  .command("metrics [path]")
  .description("Summarize an audit log (default: ROLEGUARD_AUDIT_PATH)")
  .action(async (path?: string) => {
    try {
      const rows = await readAuditFile(path || config.auditPath);
      console.log(JSON.stringify(summarizeAudit(rows), null, 2));
    } catch (err) {
      if (!(err instanceof AuditFileNotFoundError)) throw err;
      console.error(JSON.stringify({ error: err.message }));
      process.exitCode = 1;
    }
  });

program
  .command("verify-audit [path]")
  .description("Check the hash chain of an audit log")
  .action(async (path?: string) => {
    const entries = await readAuditEntries(path || config.auditPath);
    const result = verifyAuditChain(entries);
    if (!result.ok) {
      console.error("Audit chain verification failed:");
      result.failures.forEach((failure) => console.error("  ", failure));
      process.exitCode = 1;
      return;
    }
    console.log(`Audit chain OK (${entries.length} records).`);
  });

await program.parseAsync(process.argv);
