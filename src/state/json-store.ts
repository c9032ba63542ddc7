/**
 * JSON Store
 *
 * One JSON document on disk, validated on every load and replaced atomically
 * on every save. Operations on one instance run one after another.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { StoreCorruptedError, hasErrorCode } from '../errors.js';
import { writeFileAtomic } from './atomic-write.js';

export class JsonStore<T> {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly empty: () => T,
  ) {}

  read(): Promise<T> {
    return this.enqueue(() => this.load());
  }

  /**
   * Load, let `fn` change the document in place, then save it.
   * A throwing `fn` leaves the file as it was.
   */
  mutate<R>(fn: (data: T) => R): Promise<R> {
    return this.enqueue(async () => {
      const data = await this.load();
      const result = fn(data);
      await writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
      return result;
    });
  }

  private enqueue<R>(op: () => Promise<R>): Promise<R> {
    const run = this.queue.then(op, op);
    // Failures reach the caller through `run`; the chain itself keeps going.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<T> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return this.empty();
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreCorruptedError(`${this.filePath} is not valid JSON`, { cause: error });
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new StoreCorruptedError(`${this.filePath} is malformed${where}: ${issue.message}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
