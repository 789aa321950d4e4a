import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LEGACY_BREAK_GLASS_INTENT } from '../policy/policyLoader.js';
import { UNKNOWN_INTENT } from '../policy/policyEngine.js';

/**
 * Shape of an audit line as far as the summary needs it. Older or partial
 * lines are accepted; missing fields fall back to "?" or are left out of the
 * latency figures.
 */
export const AuditRowSchema = z
  .object({
    role: z.string().nullable().optional(),
    intent: z
      .object({
        intent: z.string().optional(),
        confidence: z.number().optional(),
      })
      .optional(),
    allowed: z.boolean().optional(),
    reason: z.string().optional(),
    break_glass: z.boolean().optional(),
    latency_ms: z.number().optional(),
    t_intent_ms: z.number().optional(),
    t_policy_ms: z.number().optional(),
  })
  .passthrough();

export type AuditRow = z.infer<typeof AuditRowSchema>;

export interface Percentiles {
  p50: number | null;
  p95: number | null;
}

export interface AuditSummary {
  total: number;
  allow: number;
  deny: number;
  unknown_intent_rate: number;
  allow_rate: number;
  latency_ms: Percentiles;
  t_intent_ms: Percentiles;
  t_policy_ms: Percentiles;
  by_role_allow_rate: Record<string, number>;
  by_intent_count: Record<string, number>;
  top_deny_reasons: Array<[reason: string, count: number]>;
  admin_break_glass_allowed: number;
}

/**
 * Linear-interpolated percentile, `p` in [0, 1]. Null for an empty sample.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const k = (sorted.length - 1) * p;
  const f = Math.floor(k);
  const c = Math.min(f + 1, sorted.length - 1);
  if (f === c) return sorted[f];
  return sorted[f] + (sorted[c] - sorted[f]) * (k - f);
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function percentiles(values: number[]): Percentiles {
  return { p50: percentile(values, 0.5), p95: percentile(values, 0.95) };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function usedBreakGlass(row: AuditRow): boolean {
  if (row.break_glass !== undefined) return row.break_glass && row.allowed === true;
  return row.allowed === true && row.intent?.intent === LEGACY_BREAK_GLASS_INTENT;
}

export function summarizeAudit(rows: readonly AuditRow[]): AuditSummary {
  const total = rows.length;
  const latency: number[] = [];
  const intentTimes: number[] = [];
  const policyTimes: number[] = [];
  const roleCounts = new Map<string, number>();
  const roleAllows = new Map<string, number>();
  const intentCounts = new Map<string, number>();
  const denyReasons = new Map<string, number>();
  let allowed = 0;
  let unknown = 0;
  let breakGlass = 0;

  for (const row of rows) {
    if (row.latency_ms !== undefined) latency.push(row.latency_ms);
    if (row.t_intent_ms !== undefined) intentTimes.push(row.t_intent_ms);
    if (row.t_policy_ms !== undefined) policyTimes.push(row.t_policy_ms);

    const role = row.role ?? '?';
    const intent = row.intent?.intent ?? '?';
    increment(roleCounts, role);
    increment(intentCounts, intent);
    if (intent === UNKNOWN_INTENT) unknown += 1;

    if (row.allowed === true) {
      allowed += 1;
      increment(roleAllows, role);
    } else {
      increment(denyReasons, row.reason ?? '?');
    }
    if (usedBreakGlass(row)) breakGlass += 1;
  }

  const byRoleAllowRate: Record<string, number> = {};
  for (const [role, count] of roleCounts) {
    byRoleAllowRate[role] = round4((roleAllows.get(role) ?? 0) / count);
  }

  const byIntentCount: Record<string, number> = {};
  const intentEntries = [...intentCounts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  for (const [intent, count] of intentEntries) {
    byIntentCount[intent] = count;
  }

  return {
    total,
    allow: allowed,
    deny: total - allowed,
    unknown_intent_rate: total ? round4(unknown / total) : 0,
    allow_rate: total ? round4(allowed / total) : 0,
    latency_ms: percentiles(latency),
    t_intent_ms: percentiles(intentTimes),
    t_policy_ms: percentiles(policyTimes),
    by_role_allow_rate: byRoleAllowRate,
    by_intent_count: byIntentCount,
    top_deny_reasons: [...denyReasons].sort((a, b) => b[1] - a[1]).slice(0, 5),
    admin_break_glass_allowed: breakGlass,
  };
}

/**
 * Parse JSONL audit text, skipping blank, malformed and non-object lines.
 */
export function parseAuditLines(text: string): AuditRow[] {
  const rows: AuditRow[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const result = AuditRowSchema.safeParse(parsed);
    if (result.success) rows.push(result.data);
  }
  return rows;
}

export class AuditFileNotFoundError extends Error {
  path: string;

  constructor(path: string) {
    super(`not found: ${path}`);
    this.name = 'AuditFileNotFoundError';
    this.path = path;
  }
}

/**
 * Rows of an audit file. A missing file is reported as
 * `AuditFileNotFoundError`, unlike an empty one, which summarizes to zeros.
 */
export async function readAuditFile(path: string): Promise<AuditRow[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new AuditFileNotFoundError(path);
    }
    throw err;
  }
  return parseAuditLines(text);
}
