/**
 * Tasks Command
 *
 * List queued work. With --json, print the payloads a generator consumes.
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { Workspace } from '../workspace.js';
import { TASK_KINDS, isTaskKind, taskPayload, type Task, type TaskKind } from '../state/task.js';

interface TasksOptions {
  kind?: TaskKind[];
  limit?: number;
  json?: boolean;
  all?: boolean;
}

export function parseKind(value: string, previous: TaskKind[] = []): TaskKind[] {
  if (!isTaskKind(value)) {
    throw new InvalidArgumentError(`Expected one of: ${TASK_KINDS.join(', ')}.`);
  }
  return [...previous, value];
}

const STATUS_COLOR: Record<Task['status'], (text: string) => string> = {
  pending: chalk.yellow,
  processing: chalk.blue,
  completed: chalk.green,
  failed: chalk.red,
};

export async function tasksCommand(options: TasksOptions): Promise<void> {
  const workspace = await Workspace.open();

  let tasks: Task[];
  if (options.all) {
    const kinds = options.kind;
    tasks = (await workspace.tasks.listAll()).filter(t => !kinds || kinds.includes(t.kind));
    if (options.limit !== undefined) tasks = tasks.slice(0, options.limit);
  } else {
    tasks = await workspace.tasks.listPending({ kinds: options.kind, limit: options.limit });
  }

  if (options.json) {
    console.log(JSON.stringify(tasks.map(taskPayload), null, 2));
    return;
  }

  console.log(chalk.cyan(`\n  docmark Tasks (${options.all ? 'all' : 'pending'})\n`));

  if (tasks.length === 0) {
    console.log(chalk.dim('  No tasks.'));
    console.log(chalk.dim('  Run `docmark scan` to queue marked blocks.\n'));
    return;
  }

  for (const task of tasks) {
    const accepted = task.accepted ? chalk.green(' accepted') : '';
    console.log(
      `  ${chalk.bold(`#${task.id}`)} ${STATUS_COLOR[task.status](task.status)}${accepted} ${task.kind}`,
    );
    console.log(chalk.dim(`    ${task.filePath}:${task.lineNumber} ${task.scopeName}`));
    if (task.error) console.log(chalk.red(`    ✗ ${task.error}`));
  }
  console.log('');
}
