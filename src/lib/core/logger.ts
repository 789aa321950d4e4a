import pino, { type Logger } from "pino";
import { config } from "./config.js";

/**
 * Keys that must never reach log output. Attribute values such as the
 * break-glass justification are free text and are redacted with credentials.
 */
export const REDACT_KEYS = [
  "authorization", "*.authorization",
  "headers.authorization",
  "headers[\"x-ops-api-key\"]",
  "apiKey", "*.apiKey",
  "api_key", "*.api_key",
  "token", "*.token",
  "justification", "*.justification",
];

export const REDACT_CENSOR = "[REDACTED]";

export const logger: Logger = pino({
  level: config.logLevel,
  base: {
    service: "roleguard"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Child logger tagged with the emitting module.
 */
export function getLogger(module: string): Logger {
  return logger.child({ module });
}
