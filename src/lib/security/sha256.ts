import { createHash } from 'node:crypto';

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

export function formatSha256(hex: string): string {
  return `sha256:${hex}`;
}
