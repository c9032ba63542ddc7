/**
 * Accept Command
 *
 * Mark reviewed suggestions for the next apply, or take the mark back.
 */

import chalk from 'chalk';
import { Workspace } from '../workspace.js';
import { errorMessage } from '../errors.js';

interface AcceptOptions {
  reject?: boolean;
}

export async function acceptCommand(ids: number[], options: AcceptOptions): Promise<void> {
  const workspace = await Workspace.open();
  const accepted = !options.reject;

  console.log(chalk.cyan(`\n  docmark ${accepted ? 'Accept' : 'Reject'}\n`));

  let failures = 0;
  for (const id of ids) {
    const task = await workspace.tasks.get(id);
    if (!task) {
      console.log(chalk.red(`  ✗ Task #${id} not found`));
      failures++;
      continue;
    }
    if (accepted && task.suggestion === null) {
      console.log(chalk.yellow(`  ⚠ Task #${id} has no suggestion yet`));
      failures++;
      continue;
    }
    try {
      await workspace.tasks.setAccepted(id, accepted);
      console.log(chalk.green(`  ✓ Task #${id} ${accepted ? 'accepted' : 'rejected'}`));
    } catch (error) {
      console.log(chalk.red(`  ✗ Task #${id}: ${errorMessage(error)}`));
      failures++;
    }
  }

  console.log('');
  if (failures > 0) process.exit(1);
}
