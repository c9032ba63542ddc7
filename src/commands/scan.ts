/**
 * Scan Command
 *
 * Queue documentation tasks for marked blocks that are new or changed.
 */

import chalk from 'chalk';
import { Workspace } from '../workspace.js';
import { changedFiles } from '../scanner/git-changes.js';
import { printIssues } from './shared.js';

interface ScanCommandOptions {
  path?: string[];
  force?: boolean;
  changed?: boolean;
  retryFailed?: boolean;
}

export async function scanCommand(options: ScanCommandOptions): Promise<void> {
  const workspace = await Workspace.open();

  console.log(chalk.cyan('\n  docmark Scan\n'));

  if (options.retryFailed) {
    const requeued = await workspace.tasks.requeueFailed();
    console.log(chalk.dim(`  Re-queued ${requeued} failed task(s)\n`));
  }

  let paths = options.path;
  if (options.changed) {
    paths = await changedFiles(workspace.root);
    if (paths.length === 0) {
      console.log(chalk.green('  ✓ No changed files - everything is up to date.\n'));
      return;
    }
    console.log(chalk.dim(`  ${paths.length} changed file(s) reported by git\n`));
  }

  const result = await workspace.scanner.scan({ paths, force: options.force });

  console.log(chalk.green(`  ✓ Scanned ${result.filesScanned} file(s), found ${result.blocksFound} marked block(s)`));
  console.log(chalk.dim(`    Created: ${result.tasksCreated}`));
  console.log(chalk.dim(`    Updated: ${result.tasksUpdated}`));
  console.log(chalk.dim(`    Moved: ${result.tasksMoved}`));
  if (result.tasksDetached > 0) {
    console.log(chalk.yellow(`  ⚠ ${result.tasksDetached} task(s) lost their marked block and were marked failed`));
  }

  if (result.issues.length > 0) {
    console.log('');
    printIssues(result.issues);
  }

  const { byStatus } = await workspace.tasks.stats();
  console.log(chalk.cyan(`\n  ${byStatus.pending} task(s) pending.\n`));
}
