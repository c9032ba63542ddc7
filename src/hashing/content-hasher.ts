/**
 * Content Hasher
 *
 * Full-content fingerprints for blocks, files and sets of files.
 * Modification times are never consulted: they do not survive a clone.
 */

import { readFile } from 'fs/promises';
import { createHash } from 'crypto';
import { join } from 'path';

/**
 * Hash string content (sha256, first 16 hex chars)
 */
export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex').substring(0, 16);
}

export async function hashFile(root: string, filePath: string): Promise<string> {
  return hashContent(await readFile(join(root, filePath)));
}

/**
 * Aggregate fingerprint over several files.
 * Pairs are sorted, so the order sources are listed in does not matter.
 */
export function aggregateHash(fileHashes: Map<string, string>): string {
  const pairs = Array.from(fileHashes.entries())
    .map(([path, hash]) => `${path}\0${hash}`)
    .sort();
  return hashContent(pairs.join('\n'));
}

export async function hashSources(root: string, sources: string[]): Promise<string> {
  const hashes = new Map<string, string>();
  for (const source of new Set(sources)) {
    hashes.set(source, await hashFile(root, source));
  }
  return aggregateHash(hashes);
}
