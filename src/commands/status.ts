/**
 * Status Command
 *
 * Queue counts and backup totals for the project.
 */

import chalk from 'chalk';
import { Workspace } from '../workspace.js';
import { TASK_STATUSES } from '../state/task.js';
import { FILE_PREFIX } from '../state/change-detector.js';

export async function statusCommand(): Promise<void> {
  const workspace = await Workspace.open();
  const stats = await workspace.tasks.stats();

  console.log(chalk.cyan('\n  docmark Status\n'));

  console.log(`  Tasks: ${stats.total}`);
  for (const status of TASK_STATUSES) {
    console.log(chalk.dim(`    ${status}: ${stats.byStatus[status]}`));
  }
  console.log(chalk.dim(`    accepted: ${stats.accepted}`));
  console.log(chalk.dim(`    detached: ${stats.detached}`));

  const tracked = await workspace.fingerprints.list(FILE_PREFIX);
  console.log(`\n  Files tracked: ${tracked.length}`);

  let backups = 0;
  for (const [subject] of tracked) {
    backups += (await workspace.backups.list(subject.slice(FILE_PREFIX.length))).length;
  }
  console.log(`  Backups of tracked files: ${backups}`);

  const { changed, missing } = await workspace.drift();
  for (const file of changed) console.log(chalk.yellow(`  ⚠ ${file} changed since the last scan`));
  for (const file of missing) console.log(chalk.yellow(`  ⚠ ${file} no longer exists`));

  if (stats.byStatus.failed > 0) {
    console.log(chalk.yellow(`\n  ⚠ ${stats.byStatus.failed} failed task(s); see \`docmark tasks --all\``));
  }
  if (stats.accepted > 0) {
    console.log(chalk.green(`\n  ✓ ${stats.accepted} accepted task(s) ready for \`docmark apply\``));
  }
  console.log('');
}
