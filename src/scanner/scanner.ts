/**
 * Scanner
 *
 * Turns marker blocks into tasks. A block whose fingerprint is unchanged
 * since the last pass is left alone, so re-scanning an unchanged tree is a
 * no-op. Fingerprints remember each block's anchor line, which lets tasks
 * follow their block when lines above it are added or removed. Source files
 * are only ever read here.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { DocmarkError, errorMessage } from '../errors.js';
import type { DocmarkConfig } from '../config/config.js';
import { hashContent } from '../hashing/content-hasher.js';
import { detectMarkers, serializeBlock, type MarkerBlock } from '../markers/marker-detector.js';
import { MARKER_TOKENS } from '../markers/tokens.js';
import { ChangeDetector, blockPrefix, blockSubject, fileSubject } from '../state/change-detector.js';
import { kindFor, type TaskInput } from '../state/task.js';
import type { SlotMove, TaskStore } from '../state/task-store.js';
import type { EditShift } from '../apply/applier.js';
import { discoverFiles } from './file-discovery.js';

export interface ScanIssue {
  filePath: string;
  line: number | null;
  code: string;
  message: string;
}

export interface ScanResult {
  filesScanned: number;
  blocksFound: number;
  tasksCreated: number;
  tasksUpdated: number;
  /** Tasks that followed their block to a new line. */
  tasksMoved: number;
  /** Tasks marked failed because their block is gone. */
  tasksDetached: number;
  issues: ScanIssue[];
}

export interface ScanOptions {
  paths?: string[];
  /** Re-derive tasks even for blocks whose fingerprint is unchanged. */
  force?: boolean;
}

interface TrackedBlock {
  block: MarkerBlock;
  subject: string;
  fingerprint: string;
}

/** What a block documents: its definition name, or the annotated code line. */
function identityOf(block: MarkerBlock): string {
  if (block.category !== 'comment') return block.name;
  return (block.text.split('\n')[block.anchorLine - block.startLine - 1] ?? '').trim();
}

function trackBlocks(filePath: string, blocks: MarkerBlock[]): TrackedBlock[] {
  const seen = new Map<string, number>();
  return blocks.map(block => {
    const identity = identityOf(block);
    const key = `${block.category}:${identity}`;
    const ordinal = seen.get(key) ?? 0;
    seen.set(key, ordinal + 1);
    return {
      block,
      subject: blockSubject(filePath, block.category, identity, ordinal),
      fingerprint: hashContent(serializeBlock(block)),
    };
  });
}

export function taskInputFor(block: MarkerBlock): TaskInput {
  return {
    filePath: block.filePath,
    lineNumber: block.anchorLine,
    kind: kindFor(block.category, block.doc.kind === 'present' ? 'validate' : 'generate'),
    markerText: `${block.indent}${MARKER_TOKENS[block.category].start}`,
    context: block.text,
    scopeName: block.name,
  };
}

export class Scanner {
  constructor(
    private readonly root: string,
    private readonly config: DocmarkConfig,
    private readonly store: TaskStore,
    private readonly changes: ChangeDetector,
  ) {}

  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    const result: ScanResult = {
      filesScanned: 0,
      blocksFound: 0,
      tasksCreated: 0,
      tasksUpdated: 0,
      tasksMoved: 0,
      tasksDetached: 0,
      issues: [],
    };

    const { files, skipped } = await discoverFiles(
      this.root,
      options.paths ?? this.config.scanning.paths,
      this.config.scanning,
    );
    for (const entry of skipped) {
      result.issues.push({
        filePath: entry.filePath,
        line: null,
        code: 'skipped',
        message: `${entry.filePath} ${entry.reason}`,
      });
    }

    for (const filePath of files) {
      let content: string;
      try {
        content = await readFile(join(this.root, filePath), 'utf-8');
      } catch (error) {
        result.issues.push({
          filePath,
          line: null,
          code: 'unreadable',
          message: `${filePath}: ${errorMessage(error)}`,
        });
        continue;
      }
      await this.scanContent(filePath, content, options.force ?? false, result);
      result.filesScanned++;
    }

    return result;
  }

  /**
   * Bring fingerprints of `filePath` up to date after an apply, given its
   * content just before the write. Only blocks that were current before the
   * write are re-recorded; anything edited since the last scan stays stale
   * so the next scan still sees it, with its line moved by `shift`.
   */
  async refresh(filePath: string, before: string, shift?: EditShift): Promise<number> {
    const after = await readFile(join(this.root, filePath), 'utf-8');
    const records = await this.changes.lookup(blockPrefix(filePath));
    const previous = new Map(
      trackBlocks(filePath, detectMarkers(before, filePath).blocks).map(entry => [entry.subject, entry] as const),
    );

    let refreshed = 0;
    for (const { block, subject, fingerprint } of trackBlocks(filePath, detectMarkers(after, filePath).blocks)) {
      const record = records.get(subject);
      if (!record) continue;
      if (previous.get(subject)?.fingerprint === record.hash) {
        await this.changes.record(subject, fingerprint, block.anchorLine);
        refreshed++;
      } else if (shift && record.line !== undefined && record.line >= shift.fromLine) {
        await this.changes.relocate(subject, record.line + shift.delta);
      }
    }

    const file = fileSubject(filePath);
    if ((await this.changes.compare(file, hashContent(before))) === 'unchanged') {
      await this.changes.record(file, hashContent(after));
    }
    return refreshed;
  }

  private async scanContent(filePath: string, content: string, force: boolean, result: ScanResult): Promise<void> {
    const { blocks, issues } = detectMarkers(content, filePath);
    for (const issue of issues) {
      result.issues.push(toIssue(filePath, issue));
    }
    result.blocksFound += blocks.length;

    const tracked = trackBlocks(filePath, blocks);
    const records = await this.changes.lookup(blockPrefix(filePath));
    const moves: SlotMove[] = [];
    for (const { block, subject } of tracked) {
      const line = records.get(subject)?.line;
      if (line !== undefined && line !== block.anchorLine) {
        moves.push({ category: block.category, from: line, to: block.anchorLine });
      }
    }
    const reconciled = await this.store.reconcile(
      filePath,
      moves,
      blocks.map(block => ({ lineNumber: block.anchorLine, category: block.category })),
    );
    result.tasksMoved += reconciled.moved;
    result.tasksDetached += reconciled.detached;

    for (const { block, subject, fingerprint } of tracked) {
      const record = records.get(subject);
      if (!force && record?.hash === fingerprint) {
        if (record.line !== block.anchorLine) await this.changes.record(subject, fingerprint, block.anchorLine);
        continue;
      }

      const { outcome } = await this.store.createOrUpdate(taskInputFor(block));
      if (outcome === 'created') result.tasksCreated++;
      else if (outcome === 'updated') result.tasksUpdated++;
      await this.changes.record(subject, fingerprint, block.anchorLine);
    }

    await this.changes.prune(
      blockPrefix(filePath),
      tracked.map(entry => entry.subject),
    );
    await this.changes.record(fileSubject(filePath), hashContent(content));
  }
}

function toIssue(filePath: string, error: DocmarkError & { line: number }): ScanIssue {
  return { filePath, line: error.line, code: error.code, message: error.message };
}
