import { config } from "../core/config.js";
import type { RequestContext } from "../policy/policyEngine.js";

export const ROLE_HEADER = "x-user-role";

/**
 * Request headers carrying ABAC attributes, keyed by attribute name.
 */
export const ATTRIBUTE_HEADERS: Readonly<Record<string, string>> = {
  org_unit: "x-user-orgunit",
  geo: "x-user-geo",
  ticket_id: "x-ticket-id",
  justification: "x-justification"
};

export type HeaderBag = Record<string, string | string[] | undefined>;

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the request context from identity headers. Blank headers are treated
 * as absent so that attribute checks never see empty strings.
 */
export function requestContextFromHeaders(
  headers: HeaderBag,
  defaultRole: string = config.defaultRole
): RequestContext {
  const role = headerValue(headers, ROLE_HEADER) ?? (defaultRole || undefined);
  const attributes: Record<string, string> = {};
  for (const [key, header] of Object.entries(ATTRIBUTE_HEADERS)) {
    const value = headerValue(headers, header);
    if (value !== undefined) attributes[key] = value;
  }
  return { role, attributes };
}

/**
 * Parse `key=value` pairs (CLI flags, fixtures) into an attribute map. Blank
 * values are dropped so they behave like absent headers.
 */
export function parseAttributePairs(pairs: readonly string[]): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    const value = pair.slice(idx + 1).trim();
    if (value) attributes[pair.slice(0, idx).trim()] = value;
  }
  return attributes;
}
