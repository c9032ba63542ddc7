/**
 * Suggest Command
 *
 * Store generated documentation for a task, from a file or stdin.
 */

import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { TaskNotFoundError } from '../errors.js';
import { Workspace } from '../workspace.js';
import { parseSuggestion } from '../apply/suggestion.js';
import type { Task } from '../state/task.js';
import type { TaskStore } from '../state/task-store.js';

interface SuggestOptions {
  file?: string;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Move `id` through processing to completed with `suggestion` attached.
 * A failed task is re-queued first. The suggestion must parse for the
 * task's kind; nothing is stored otherwise.
 */
export async function recordSuggestion(store: TaskStore, id: number, suggestion: string): Promise<Task> {
  const task = await store.get(id);
  if (!task) throw new TaskNotFoundError(id);
  parseSuggestion(task.kind, suggestion);

  if (task.status === 'failed') await store.markPending(id);
  await store.markProcessing(id);
  await store.setSuggestion(id, suggestion);
  return store.markCompleted(id);
}

export async function suggestCommand(id: number, options: SuggestOptions): Promise<void> {
  const workspace = await Workspace.open();
  const suggestion = options.file ? await readFile(options.file, 'utf-8') : await readStdin();

  const task = await recordSuggestion(workspace.tasks, id, suggestion);

  console.log(chalk.green(`\n  ✓ Stored suggestion for task #${task.id} (${task.kind})`));
  console.log(chalk.dim(`    Review with: docmark show ${task.id}`));
  console.log(chalk.dim(`    Accept with: docmark accept ${task.id}\n`));
}
