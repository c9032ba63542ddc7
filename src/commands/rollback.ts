/**
 * Rollback Command
 *
 * Restore a file from its most recent backup.
 */

import chalk from 'chalk';
import { Workspace } from '../workspace.js';

interface RollbackOptions {
  filePath: string;
}

export async function rollbackCommand(options: RollbackOptions): Promise<void> {
  const workspace = await Workspace.open();

  console.log(chalk.cyan('\n  docmark Rollback\n'));

  const backupId = await workspace.backups.latest(options.filePath);
  if (!backupId || !(await workspace.backups.restoreLatest(options.filePath))) {
    console.log(chalk.red(`  ✗ No backup found for ${options.filePath}\n`));
    process.exit(1);
  }

  console.log(chalk.green(`  ✓ Restored ${options.filePath}`));
  console.log(chalk.dim(`    From: ${backupId}`));
  console.log(chalk.dim('    Run `docmark scan` to re-queue its blocks.\n'));
}
