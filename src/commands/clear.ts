/**
 * Clear Command
 *
 * Drop every task and fingerprint so the next scan starts over.
 * Backups are kept.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { Workspace } from '../workspace.js';

interface ClearOptions {
  yes?: boolean;
}

function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export async function clearCommand(options: ClearOptions): Promise<void> {
  const workspace = await Workspace.open();

  console.log(chalk.cyan('\n  docmark Clear\n'));

  const { total } = await workspace.tasks.stats();
  if (!options.yes && !(await confirm(chalk.yellow(`  Delete ${total} task(s) and all fingerprints? [y/N] `)))) {
    console.log(chalk.dim('  Cancelled.\n'));
    return;
  }

  const removed = await workspace.tasks.clearAll();
  await workspace.fingerprints.clear();
  console.log(chalk.green(`  ✓ Removed ${removed} task(s) and cleared fingerprints`));
  console.log(chalk.dim('    Backups were kept.\n'));
}
