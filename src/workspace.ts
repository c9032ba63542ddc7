/**
 * Workspace
 *
 * Everything a command needs for one project root, built once and passed
 * down explicitly.
 */

import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { loadConfig, STATE_DIR, type DocmarkConfig } from './config/config.js';
import { Applier, type ApplyResult } from './apply/applier.js';
import { BackupManager } from './apply/backup-manager.js';
import { hasErrorCode } from './errors.js';
import { hashFile } from './hashing/content-hasher.js';
import { ChangeDetector, FILE_PREFIX } from './state/change-detector.js';
import { JsonFingerprintStore, type FingerprintStore } from './state/fingerprint-store.js';
import { JsonTaskStore, type TaskStore } from './state/task-store.js';
import { Scanner } from './scanner/scanner.js';

export interface ApplyRun {
  results: ApplyResult[];
  /** Files rewritten during the run. */
  modified: string[];
}

/** Tracked files whose content no longer matches the last scan. */
export interface Drift {
  changed: string[];
  missing: string[];
}

export class Workspace {
  readonly stateDir: string;
  readonly tasks: TaskStore;
  readonly fingerprints: FingerprintStore;
  readonly changes: ChangeDetector;
  readonly backups: BackupManager;
  readonly scanner: Scanner;
  readonly applier: Applier;

  constructor(
    readonly root: string,
    readonly config: DocmarkConfig,
  ) {
    this.stateDir = join(root, STATE_DIR);
    this.tasks = new JsonTaskStore(this.stateDir);
    this.fingerprints = new JsonFingerprintStore(this.stateDir);
    this.changes = new ChangeDetector(root, this.fingerprints);
    this.backups = new BackupManager(root, resolve(root, config.output.backupDir));
    this.scanner = new Scanner(root, config, this.tasks, this.changes);
    this.applier = new Applier(root, this.tasks, this.backups);
  }

  static async open(root = process.cwd()): Promise<Workspace> {
    const absolute = resolve(root);
    return new Workspace(absolute, await loadConfig(absolute));
  }

  /**
   * Apply every accepted task, bottom-up per file. After each write the
   * fingerprints of blocks that were current before it are refreshed.
   */
  async applyAccepted(): Promise<ApplyRun> {
    const results: ApplyResult[] = [];
    const modified = new Set<string>();

    for (const { id } of await this.tasks.listAccepted()) {
      // Anchors may have moved since the list was read.
      const task = await this.tasks.get(id);
      if (!task) continue;
      const before = await this.readSource(task.filePath);
      const result = await this.applier.apply(task);
      results.push(result);
      if (!result.changed || before === null) continue;
      modified.add(task.filePath);
      await this.scanner.refresh(task.filePath, before, result.shift);
    }
    return { results, modified: [...modified] };
  }

  private async readSource(filePath: string): Promise<string | null> {
    try {
      return await readFile(join(this.root, filePath), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }
  }

  async drift(): Promise<Drift> {
    const drift: Drift = { changed: [], missing: [] };
    for (const [subject, record] of await this.fingerprints.list(FILE_PREFIX)) {
      const filePath = subject.slice(FILE_PREFIX.length);
      let hash: string;
      try {
        hash = await hashFile(this.root, filePath);
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error;
        drift.missing.push(filePath);
        continue;
      }
      if (hash !== record.hash) drift.changed.push(filePath);
    }
    return drift;
  }
}
