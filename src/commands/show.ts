/**
 * Show Command
 *
 * Print a task's current documentation next to its suggestion, for review.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import { TaskNotFoundError } from '../errors.js';
import { Workspace } from '../workspace.js';
import { detectMarkers } from '../markers/marker-detector.js';
import { categoryOf, type Task } from '../state/task.js';
import type { DocState } from '../markers/doc-literal.js';

/**
 * Documentation the file holds right now at the task's anchor,
 * or null when the block can no longer be found.
 */
export async function currentDoc(root: string, task: Task): Promise<DocState | null> {
  const content = await readFile(join(root, task.filePath), 'utf-8');
  const category = categoryOf(task.kind);
  const block = detectMarkers(content, task.filePath).blocks.find(
    b => b.category === category && b.anchorLine === task.lineNumber,
  );
  return block ? block.doc : null;
}

function printIndented(text: string, color: (text: string) => string): void {
  for (const line of text.split('\n')) {
    console.log(color(`    ${line}`));
  }
}

export async function showCommand(id: number): Promise<void> {
  const workspace = await Workspace.open();
  const task = await workspace.tasks.get(id);
  if (!task) throw new TaskNotFoundError(id);

  console.log(chalk.cyan(`\n  Task #${task.id}: ${task.kind}\n`));
  console.log(chalk.dim(`  ${task.filePath}:${task.lineNumber} ${task.scopeName}`));
  console.log(chalk.dim(`  Status: ${task.status}${task.accepted ? ' (accepted)' : ''}`));
  if (task.error) console.log(chalk.red(`  ✗ ${task.error}`));

  console.log(chalk.cyan('\n  Current documentation:'));
  const doc = await currentDoc(workspace.root, task);
  if (doc === null) {
    console.log(chalk.yellow('  ⚠ Block not found at this line. Run `docmark scan`.'));
  } else if (doc.kind === 'absent') {
    console.log(chalk.dim('    (none)'));
  } else {
    printIndented(doc.content, doc.kind === 'placeholder' ? chalk.yellow : chalk.white);
  }

  console.log(chalk.cyan('\n  Suggestion:'));
  if (task.suggestion === null) {
    console.log(chalk.dim('    (none yet)'));
  } else {
    printIndented(task.suggestion, chalk.green);
  }
  console.log('');
}
