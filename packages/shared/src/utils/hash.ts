import { createHash } from 'node:crypto';

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function stableId(parts: readonly string[], length = 24): string {
  return sha256(parts.join('\u0000')).slice(0, length);
}
