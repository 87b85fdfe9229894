import { createHash } from 'node:crypto';

export type FileRole = 'base' | 'update';

export interface FingerprintInput {
  role: FileRole;
  content: Buffer;
}

export function sha256(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Identity of an upload: the same files in the same roles give the same
 * fingerprint whatever order they arrive in.
 */
export function batchFingerprint(files: readonly FingerprintInput[]): string {
  const entries = files.map((f) => `${f.role}:${sha256(f.content)}`).sort();
  return sha256(entries.join('\n'));
}
