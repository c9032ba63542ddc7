/**
 * Diff Command
 *
 * Show what the last apply changed in a file: latest backup against the
 * file as it is now.
 */

import { access } from 'fs/promises';
import { join } from 'path';
import { execFileSync } from 'child_process';
import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import { Workspace } from '../workspace.js';
import { printDiff } from './shared.js';

interface DiffOptions {
  filePath: string;
}

interface DiffFailure {
  status: unknown;
  stdout: string;
}

function isDiffFailure(error: unknown): error is DiffFailure {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    'stdout' in error &&
    typeof error.stdout === 'string'
  );
}

export async function diffCommand(options: DiffOptions): Promise<void> {
  const workspace = await Workspace.open();

  console.log(chalk.cyan('\n  docmark Diff\n'));

  const backupId = await workspace.backups.latest(options.filePath);
  if (!backupId) {
    console.log(chalk.yellow(`  No backup found for ${options.filePath}.`));
    console.log(chalk.dim('  Backups are taken by `docmark apply`.\n'));
    process.exit(1);
  }

  const current = join(workspace.root, options.filePath);
  await access(current);
  console.log(chalk.dim(`  Comparing: ${backupId} → ${options.filePath}\n`));

  // diff exits 1 when the files differ
  try {
    execFileSync('diff', ['-u', workspace.backups.backupPath(backupId), current], {
      encoding: 'utf-8',
      maxBuffer: 10 * 1024 * 1024,
    });
    console.log(chalk.green('  ✓ No differences - file matches its latest backup.\n'));
  } catch (error: unknown) {
    if (isDiffFailure(error) && error.status === 1) {
      printDiff(error.stdout);
      console.log(chalk.cyan('\n  To undo these changes:'));
      console.log(chalk.dim(`    docmark rollback --file-path ${options.filePath}\n`));
    } else {
      console.log(chalk.red(`  ✗ Error running diff: ${errorMessage(error)}`));
      process.exit(1);
    }
  }
}
