/**
 * Apply Command
 *
 * Write every accepted suggestion into its source file. Each touched file
 * is backed up first; `docmark rollback` restores the latest backup.
 */

import chalk from 'chalk';
import { Workspace } from '../workspace.js';

export async function applyCommand(): Promise<void> {
  const workspace = await Workspace.open();

  console.log(chalk.cyan('\n  docmark Apply\n'));

  const { results, modified } = await workspace.applyAccepted();
  if (results.length === 0) {
    console.log(chalk.yellow('  No accepted tasks.'));
    console.log(chalk.dim('  Accept suggestions with `docmark accept <id>` first.\n'));
    return;
  }

  let failed = 0;
  for (const result of results) {
    if (!result.success) {
      failed++;
      console.log(chalk.red(`  ✗ #${result.taskId} ${result.filePath}: ${result.error}`));
    } else if (result.changed) {
      console.log(chalk.green(`  ✓ #${result.taskId} ${result.filePath}`));
      console.log(chalk.dim(`    Backup: ${result.backupId}`));
    } else {
      console.log(chalk.dim(`  · #${result.taskId} ${result.filePath} already up to date`));
    }
  }

  console.log(chalk.cyan(`\n  Applied ${results.length - failed} of ${results.length} task(s), ${modified.length} file(s) modified.`));
  if (failed > 0) {
    console.log(chalk.dim('  Failed tasks keep their suggestion; see `docmark tasks --all`.\n'));
    process.exit(1);
  }
  console.log('');
}
