/**
 * Audit Log
 *
 * One record per gated request. Sinks are append-only; nothing here exposes
 * update or delete. The JSONL sink chains records with sha256 so edits to
 * earlier lines are detectable.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { stableStringify, type JsonValue } from '../security/stableJson.js';
import { sha256Hex, formatSha256 } from '../security/sha256.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Everything the decision core knows about one request.
 */
export interface AuditRecord {
  request_id: string;
  ts: string;
  role: string | null;
  attrs: Record<string, string>;
  intent: { intent: string; confidence: number };
  allowed: boolean;
  reason: string;
  resources: string[];
  break_glass: boolean;
  t_intent_ms: number;
  t_policy_ms: number;
  latency_ms: number;
  prompt_chars: number;
  policy_version: string;
}

export interface AuditChainLine extends AuditRecord {
  seq: number;
  prev_hash: string | null;
  hash: string;
}

export interface AuditChainVerification {
  ok: boolean;
  failures: string[];
}

export interface AuditSink {
  append(record: AuditRecord): Promise<void>;
}

// ============================================================================
// Hash chain
// ============================================================================

function toJsonValue(record: AuditRecord): JsonValue {
  return {
    request_id: record.request_id,
    ts: record.ts,
    role: record.role,
    attrs: { ...record.attrs },
    intent: { intent: record.intent.intent, confidence: record.intent.confidence },
    allowed: record.allowed,
    reason: record.reason,
    resources: [...record.resources],
    break_glass: record.break_glass,
    t_intent_ms: record.t_intent_ms,
    t_policy_ms: record.t_policy_ms,
    latency_ms: record.latency_ms,
    prompt_chars: record.prompt_chars,
    policy_version: record.policy_version,
  };
}

export function hashAuditRecord(record: AuditRecord, seq: number, prevHash: string | null): string {
  const payload = stableStringify({
    seq,
    prev_hash: prevHash,
    record: toJsonValue(record),
  });
  return formatSha256(sha256Hex(payload));
}

function stripChain(line: AuditChainLine): AuditRecord {
  const { seq: _seq, prev_hash: _prev, hash: _hash, ...record } = line;
  return record;
}

const ChainLinkSchema = z.object({
  seq: z.number().int(),
  prev_hash: z.string().nullable(),
  hash: z.string(),
});

export const AuditChainLineSchema = ChainLinkSchema.extend({
  request_id: z.string(),
  ts: z.string(),
  role: z.string().nullable(),
  attrs: z.record(z.string()),
  intent: z.object({ intent: z.string(), confidence: z.number() }),
  allowed: z.boolean(),
  reason: z.string(),
  resources: z.array(z.string()),
  break_glass: z.boolean(),
  t_intent_ms: z.number(),
  t_policy_ms: z.number(),
  latency_ms: z.number(),
  prompt_chars: z.number(),
  policy_version: z.string(),
});

/**
 * Check sequence numbers, links and hashes of parsed audit lines.
 *
 * Entries that do not carry a readable `seq`/`prev_hash`/`hash` are reported
 * as `line_<n>_malformed` and do not advance the chain; entries that link
 * but miss record fields are reported as `seq_<n>_malformed`.
 */
export function verifyAuditChain(entries: readonly unknown[]): AuditChainVerification {
  const failures: string[] = [];
  let prevHash: string | null = null;
  let expectedSeq = 1;

  entries.forEach((entry, index) => {
    const link = ChainLinkSchema.safeParse(entry);
    if (!link.success) {
      failures.push(`line_${index + 1}_malformed`);
      return;
    }

    const { seq, prev_hash, hash } = link.data;
    if (seq !== expectedSeq) {
      failures.push(`seq_${seq}_out_of_order`);
    }
    if (prev_hash !== prevHash) {
      failures.push(`seq_${seq}_prev_hash_mismatch`);
    }
    const line = AuditChainLineSchema.safeParse(entry);
    if (!line.success) {
      failures.push(`seq_${seq}_malformed`);
    } else if (hashAuditRecord(stripChain(line.data), seq, prev_hash) !== hash) {
      failures.push(`seq_${seq}_hash_mismatch`);
    }
    prevHash = hash;
    expectedSeq = seq + 1;
  });

  return { ok: failures.length === 0, failures };
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * JSON-lines file sink. Each record is written by a single append call and
 * appends are queued, so concurrent requests never interleave partial lines.
 */
export class JsonlAuditSink implements AuditSink {
  private readonly path: string;
  private queue: Promise<void> = Promise.resolve();
  private head: { seq: number; hash: string | null } | null = null;

  constructor(path: string) {
    this.path = path;
  }

  append(record: AuditRecord): Promise<void> {
    const write = this.queue.then(() => this.write(record));
    // Keep the queue usable after a failed write; the caller still sees the error.
    this.queue = write.catch(() => undefined);
    return write;
  }

  private async write(record: AuditRecord): Promise<void> {
    const head = this.head ?? (await this.readHead());
    const seq = head.seq + 1;
    const line: AuditChainLine = {
      ...record,
      seq,
      prev_hash: head.hash,
      hash: hashAuditRecord(record, seq, head.hash),
    };
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${JSON.stringify(line)}\n`, 'utf8');
    this.head = { seq, hash: line.hash };
  }

  private async readHead(): Promise<{ seq: number; hash: string | null }> {
    const lines = await readChainLines(this.path);
    const last = lines[lines.length - 1];
    return last ? { seq: last.seq, hash: last.hash } : { seq: 0, hash: null };
  }
}

/**
 * Keeps records in process; used by tests and embedders that forward records elsewhere.
 */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}

/**
 * Every non-blank line of a JSONL audit file, parsed. A line that is not JSON
 * is kept as its raw text so verification can report it. A missing file
 * reads as empty.
 */
export async function readAuditEntries(path: string): Promise<unknown[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const entries: unknown[] = [];
  for (const raw of text.split('\n')) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    try {
      entries.push(JSON.parse(trimmed));
    } catch {
      entries.push(trimmed);
    }
  }
  return entries;
}

/**
 * Well-formed chained lines of a JSONL audit file; anything else is skipped.
 */
export async function readChainLines(path: string): Promise<AuditChainLine[]> {
  const lines: AuditChainLine[] = [];
  for (const entry of await readAuditEntries(path)) {
    const parsed = AuditChainLineSchema.safeParse(entry);
    if (parsed.success) lines.push(parsed.data);
  }
  return lines;
}
