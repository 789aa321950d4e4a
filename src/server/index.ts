import Fastify, { type FastifyBaseLogger } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { requestContextFromHeaders } from "../lib/auth/identity.js";
import { OpsAuthError, requireOpsKey } from "../lib/auth/opsAuth.js";
import type { AuditSink } from "../lib/governance/auditLog.js";
import { Gate, type IntentSource } from "../lib/governance/gate.js";
import { PolicyConfigError } from "../lib/policy/policyLoader.js";
import type { PolicyStore } from "../lib/policy/policyStore.js";
import { EchoUpstream, type UpstreamLlm } from "../lib/providers/upstream.js";

const ChatRequestSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.string(),
        content: z.string()
      })
    )
    .min(1)
});

export interface ClassifierPort extends IntentSource {
  warmup(): Promise<void>;
}

export interface AppDeps {
  policies: PolicyStore;
  classifier: ClassifierPort;
  audit: AuditSink;
  upstream?: UpstreamLlm;
  /** Role used when x-user-role is absent; undefined falls back to config. */
  defaultRole?: string;
  /** Key for ops endpoints; undefined falls back to config. */
  opsApiKey?: string;
  logger?: FastifyBaseLogger;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw && raw.trim() ? raw.trim() : undefined;
}

export function buildApp(deps: AppDeps) {
  const app = Fastify({ logger: deps.logger ?? false });
  const gate = new Gate({
    classifier: deps.classifier,
    policies: deps.policies,
    audit: deps.audit
  });
  const upstream = deps.upstream ?? new EchoUpstream();

  app.get("/", async () => ({ status: "ok" }));

  app.get("/healthz", async () => ({ ok: true }));

  app.get("/readyz", async (request, reply) => {
    try {
      await deps.classifier.warmup();
      return { ok: true, policy_version: deps.policies.current().version };
    } catch (err) {
      request.log.warn({ err }, "readiness check failed");
      const message = err instanceof Error ? err.message : String(err);
      return reply.code(503).send({ ok: false, error: message });
    }
  });

  app.get("/whoami", async (request) => {
    const context = requestContextFromHeaders(request.headers, deps.defaultRole);
    return {
      role: context.role ?? null,
      attrs: context.attributes,
      request_id: firstHeader(request.headers["x-request-id"]) ?? null
    };
  });

  app.post("/chat", async (request, reply) => {
    const requestId = firstHeader(request.headers["x-request-id"]) ?? uuidv4();
    reply.header("X-Request-Id", requestId);

    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.header("X-Policy-Version", deps.policies.current().version);
      return reply.code(400).send({
        error: "invalid request",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }

    const messages = parsed.data.messages;
    const prompt = messages[messages.length - 1].content.trim();
    if (!prompt) {
      reply.header("X-Policy-Version", deps.policies.current().version);
      return reply.code(400).send({ error: "empty content" });
    }

    const context = requestContextFromHeaders(request.headers, deps.defaultRole);
    const outcome = await gate.check({ requestId, text: prompt, context });
    reply.header("X-Policy-Version", outcome.policyVersion);

    if (!outcome.decision.allowed) {
      return reply.code(403).send({
        response: {
          blocked: true,
          intent: outcome.decision.intent,
          reason: outcome.decision.reason
        }
      });
    }

    const answer = await upstream.complete(prompt);
    return reply.code(200).send({
      response: {
        blocked: false,
        intent: outcome.decision.intent,
        answer
      }
    });
  });

  app.post("/ops/policy/reload", async (request, reply) => {
    try {
      requireOpsKey(request.headers, deps.opsApiKey);
    } catch (err) {
      if (err instanceof OpsAuthError) {
        return reply.code(401).send({ ok: false, error: err.message });
      }
      throw err;
    }

    try {
      const next = deps.policies.reload();
      return { ok: true, policy_version: next.version };
    } catch (err) {
      if (err instanceof PolicyConfigError) {
        request.log.error({ err }, "policy reload rejected; keeping active policy");
        return reply.code(422).send({
          ok: false,
          error: err.message,
          issues: err.issues,
          policy_version: deps.policies.current().version
        });
      }
      throw err;
    }
  });

  return app;
}
