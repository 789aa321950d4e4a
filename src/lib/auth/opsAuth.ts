import { config } from "../core/config.js";

export class OpsAuthError extends Error {
  code: "missing_token" | "invalid_token";

  constructor(message: string, code: OpsAuthError["code"]) {
    super(message);
    this.name = "OpsAuthError";
    this.code = code;
  }
}

/**
 * Ops endpoints are open when no key is configured (local single-operator
 * use); otherwise `x-ops-api-key` must match.
 */
export function requireOpsKey(
  headers: Record<string, unknown>,
  requiredKey: string = config.opsLocalApiKey
): void {
  if (!requiredKey) return;
  const provided = headers["x-ops-api-key"];
  if (!provided || typeof provided !== "string") {
    throw new OpsAuthError("Missing ops API key", "missing_token");
  }
  if (provided !== requiredKey) {
    throw new OpsAuthError("Invalid ops API key", "invalid_token");
  }
}
