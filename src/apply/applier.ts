/**
 * Applier
 *
 * Writes a task's suggestion into its source file:
 * re-read, locate, render, back up, replace atomically, then drop the task.
 * Any failure before the write leaves the file untouched and the task failed.
 * A failure to drop the task after the write reports the file as changed.
 * Which tasks get applied (accepted or not) is the caller's decision.
 */

import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { InvalidSuggestionError, StoreCorruptedError, errorMessage } from '../errors.js';
import { categoryOf, type Task } from '../state/task.js';
import type { TaskStore } from '../state/task-store.js';
import { writeFileAtomic } from '../state/atomic-write.js';
import type { BackupManager } from './backup-manager.js';
import { locate, type EditSite } from './locator.js';
import { parseSuggestion, renderComment, renderDocstring, type DocSuggestion } from './suggestion.js';

export interface ApplyResult {
  taskId: number;
  filePath: string;
  success: boolean;
  /** False when the file was left as it was. */
  changed: boolean;
  error?: string;
  backupId?: string;
  /** Line movement caused by the write. */
  shift?: EditShift;
}

export interface EditShift {
  /** Lines at or below this one (pre-edit numbering) moved by `delta`. */
  fromLine: number;
  delta: number;
}

export interface Edit {
  content: string;
  /** First line (1-based, pre-edit numbering) after the replaced span. */
  fromLine: number;
  delta: number;
}

export class Applier {
  constructor(
    private readonly root: string,
    private readonly store: TaskStore,
    private readonly backups: BackupManager,
  ) {}

  async apply(task: Task, suggestion: string | null = task.suggestion): Promise<ApplyResult> {
    const base = { taskId: task.id, filePath: task.filePath };
    if (task.status === 'pending' || task.status === 'processing') {
      return {
        ...base,
        success: false,
        changed: false,
        error: `Task ${task.id} is ${task.status}; only completed or failed tasks can be applied`,
      };
    }

    try {
      if (suggestion === null) {
        throw new InvalidSuggestionError(`Task ${task.id} has no suggestion`);
      }
      const parsed = parseSuggestion(task.kind, suggestion);
      if (parsed === null) {
        await this.store.delete(task.id);
        return { ...base, success: true, changed: false };
      }

      const path = join(this.root, task.filePath);
      const original = await readFile(path, 'utf-8');
      const edit = planEdit(original, task, parsed);
      if (edit.content === original) {
        await this.store.delete(task.id);
        return { ...base, success: true, changed: false };
      }

      const backupId = await this.backups.snapshot(task.filePath);
      await writeFileAtomic(path, edit.content, { mode: (await stat(path)).mode });
      const shift = { fromLine: edit.fromLine, delta: edit.delta };
      try {
        await this.store.delete(task.id, { shift: { filePath: task.filePath, ...shift } });
      } catch (error) {
        if (error instanceof StoreCorruptedError) throw error;
        return {
          ...base,
          success: false,
          changed: true,
          backupId,
          shift,
          error: `Wrote ${task.filePath} but could not remove task ${task.id}: ${errorMessage(error)}`,
        };
      }
      return { ...base, success: true, changed: true, backupId, shift };
    } catch (error) {
      if (error instanceof StoreCorruptedError) throw error;
      const message = errorMessage(error);
      await this.store.markFailed(task.id, message);
      return { ...base, success: false, changed: false, error: message };
    }
  }
}

/**
 * Compute the new file content for `suggestion` without touching disk.
 * Line endings of the file are kept; inserted lines follow the file's style.
 */
export function planEdit(
  content: string,
  task: Pick<Task, 'kind' | 'lineNumber' | 'markerText' | 'scopeName'>,
  suggestion: DocSuggestion,
): Edit {
  const lines = content.split('\n');
  const site = locate(lines, {
    category: categoryOf(task.kind),
    lineNumber: task.lineNumber,
    markerText: task.markerText,
    scopeName: task.scopeName,
  });

  const eol = content.includes('\r\n') ? '\r' : '';
  const rendered = render(suggestion, site).map(line => `${line}${eol}`);
  lines.splice(site.start, site.deleteCount, ...rendered);
  return {
    content: lines.join('\n'),
    fromLine: site.start + site.deleteCount + 1,
    delta: rendered.length - site.deleteCount,
  };
}

function render(suggestion: DocSuggestion, site: EditSite): string[] {
  switch (suggestion.kind) {
    case 'comment':
      return renderComment(suggestion.text, site.indent);
    case 'module':
    case 'class':
    case 'function':
    case 'text':
      return renderDocstring(suggestion, site.indent);
  }
}
