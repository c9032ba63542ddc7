/**
 * Change Detector
 *
 * Compares stored fingerprints against current content. Subjects are plain
 * strings so the same primitive serves source files, marker blocks and
 * derived artifacts that depend on several files.
 */

import type { MarkerCategory } from '../markers/tokens.js';
import { hashSources } from '../hashing/content-hasher.js';
import type { FingerprintRecord, FingerprintStore } from './fingerprint-store.js';

export type Comparison = 'new' | 'unchanged' | 'changed';

export const FILE_PREFIX = 'file:';

export function fileSubject(filePath: string): string {
  return `${FILE_PREFIX}${filePath}`;
}

/** Prefix shared by every block subject of one file. */
export function blockPrefix(filePath: string): string {
  return `block:${filePath}:`;
}

/**
 * Blocks are keyed by what they document rather than where they sit, so a
 * block keeps its subject when lines above it move. `ordinal` separates
 * blocks sharing an identity within one file.
 */
export function blockSubject(filePath: string, category: MarkerCategory, identity: string, ordinal = 0): string {
  return `${blockPrefix(filePath)}${category}:${identity}#${ordinal}`;
}

export function artifactSubject(name: string): string {
  return `artifact:${name}`;
}

export class ChangeDetector {
  constructor(
    private readonly root: string,
    private readonly fingerprints: FingerprintStore,
  ) {}

  /**
   * True when `subject` has no record or its sources hash differently now.
   */
  async needsRegeneration(subject: string, sources: string[]): Promise<boolean> {
    const current = await hashSources(this.root, sources);
    return (await this.compare(subject, current)) !== 'unchanged';
  }

  async compare(subject: string, fingerprint: string): Promise<Comparison> {
    const record = await this.fingerprints.get(subject);
    if (!record) return 'new';
    return record.hash === fingerprint ? 'unchanged' : 'changed';
  }

  record(subject: string, fingerprint: string, line?: number): Promise<void> {
    return this.fingerprints.set(subject, fingerprint, line);
  }

  relocate(subject: string, line: number): Promise<void> {
    return this.fingerprints.relocate(subject, line);
  }

  async lookup(prefix: string): Promise<Map<string, FingerprintRecord>> {
    return new Map(await this.fingerprints.list(prefix));
  }

  async recordSources(subject: string, sources: string[]): Promise<string> {
    const fingerprint = await hashSources(this.root, sources);
    await this.fingerprints.set(subject, fingerprint);
    return fingerprint;
  }

  prune(prefix: string, keep: Iterable<string>): Promise<number> {
    return this.fingerprints.prune(prefix, new Set(keep));
  }
}
