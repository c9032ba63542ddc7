import { join } from 'path';
import { z } from 'zod';
import { JsonStore } from './json-store.js';

const recordSchema = z.object({
  hash: z.string(),
  recordedAt: z.string(),
  /** Anchor line of a block when it was recorded. */
  line: z.number().int().positive().optional(),
});

export type FingerprintRecord = z.infer<typeof recordSchema>;

const fingerprintFileSchema = z.object({
  records: z.record(z.string(), recordSchema),
});

type FingerprintFile = z.infer<typeof fingerprintFileSchema>;

export interface FingerprintStore {
  get(subject: string): Promise<FingerprintRecord | null>;
  set(subject: string, hash: string, line?: number): Promise<void>;
  /** Move the recorded line of `subject`, keeping its hash. */
  relocate(subject: string, line: number): Promise<void>;
  /** Remove subjects starting with `prefix` that are not in `keep`. */
  prune(prefix: string, keep: ReadonlySet<string>): Promise<number>;
  list(prefix?: string): Promise<Array<[string, FingerprintRecord]>>;
  clear(): Promise<void>;
}

export class JsonFingerprintStore implements FingerprintStore {
  private store: JsonStore<FingerprintFile>;

  constructor(stateDir: string, private readonly now: () => Date = () => new Date()) {
    this.store = new JsonStore(join(stateDir, 'fingerprints.json'), fingerprintFileSchema, () => ({ records: {} }));
  }

  async get(subject: string): Promise<FingerprintRecord | null> {
    const data = await this.store.read();
    return Object.hasOwn(data.records, subject) ? data.records[subject] : null;
  }

  set(subject: string, hash: string, line?: number): Promise<void> {
    return this.store.mutate(data => {
      const record: FingerprintRecord = { hash, recordedAt: this.now().toISOString() };
      if (line !== undefined) record.line = line;
      data.records[subject] = record;
    });
  }

  relocate(subject: string, line: number): Promise<void> {
    return this.store.mutate(data => {
      if (Object.hasOwn(data.records, subject)) data.records[subject].line = line;
    });
  }

  prune(prefix: string, keep: ReadonlySet<string>): Promise<number> {
    return this.store.mutate(data => {
      let removed = 0;
      for (const subject of Object.keys(data.records)) {
        if (subject.startsWith(prefix) && !keep.has(subject)) {
          delete data.records[subject];
          removed++;
        }
      }
      return removed;
    });
  }

  async list(prefix = ''): Promise<Array<[string, FingerprintRecord]>> {
    const data = await this.store.read();
    return Object.entries(data.records)
      .filter(([subject]) => subject.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  clear(): Promise<void> {
    return this.store.mutate(data => {
      data.records = {};
    });
  }
}
