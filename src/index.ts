#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from './errors.js';
import { initCommand } from './commands/init.js';
import { scanCommand } from './commands/scan.js';
import { tasksCommand, parseKind } from './commands/tasks.js';
import { showCommand } from './commands/show.js';
import { suggestCommand } from './commands/suggest.js';
import { acceptCommand } from './commands/accept.js';
import { applyCommand } from './commands/apply.js';
import { rollbackCommand } from './commands/rollback.js';
import { diffCommand } from './commands/diff.js';
import { clearCommand } from './commands/clear.js';
import { statusCommand } from './commands/status.js';
import { collect, parsePositiveInt, parseTaskId, parseTaskIds } from './commands/shared.js';

const program = new Command();

program
  .name('docmark')
  .description('Marker-driven documentation queue for Python sources')
  .version('0.1.0');

program
  .command('init')
  .description('Create .docmark/config.yaml with default settings')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

program
  .command('scan')
  .description('Queue tasks for new or changed marked blocks')
  .option('-p, --path <path>', 'File or directory to scan (repeatable, defaults to config)', collect)
  .option('--force', 'Re-derive tasks for unchanged blocks too')
  .option('--changed', 'Only scan files git reports as changed')
  .option('--retry-failed', 'Re-queue failed tasks that never got a suggestion')
  .action(scanCommand);

program
  .command('tasks')
  .description('List pending tasks')
  .option('-k, --kind <kind>', 'Only tasks of this kind (repeatable)', parseKind)
  .option('-n, --limit <n>', 'Show at most n tasks', parsePositiveInt)
  .option('--all', 'Include tasks in every status')
  .option('--json', 'Print generator payloads as JSON')
  .action(tasksCommand);

program
  .command('show')
  .description('Show current documentation and the suggestion for a task')
  .argument('<id>', 'Task id', parseTaskId)
  .action(showCommand);

program
  .command('suggest')
  .description('Store a suggestion for a task (reads stdin unless --file is given)')
  .argument('<id>', 'Task id', parseTaskId)
  .option('-f, --file <path>', 'Read the suggestion from a file')
  .action(suggestCommand);

program
  .command('accept')
  .description('Accept suggestions for the next apply')
  .argument('<ids...>', 'Task ids', parseTaskIds)
  .option('--reject', 'Withdraw acceptance instead')
  .action(acceptCommand);

program
  .command('apply')
  .description('Write accepted suggestions into their files, with backups')
  .action(applyCommand);

program
  .command('rollback')
  .description('Restore a file from its latest backup')
  .requiredOption('--file-path <path>', 'File to restore, relative to the project root')
  .action(rollbackCommand);

program
  .command('diff')
  .description('Show changes since the latest backup of a file')
  .requiredOption('--file-path <path>', 'File to compare, relative to the project root')
  .action(diffCommand);

program
  .command('clear')
  .description('Delete all tasks and fingerprints (backups are kept)')
  .option('-y, --yes', 'Skip confirmation')
  .action(clearCommand);

program
  .command('status')
  .description('Show task counts and tracked files')
  .action(statusCommand);

// Show help if no command provided
if (!process.argv.slice(2).length) {
  console.log(chalk.cyan('\n  docmark - marker-driven documentation\n'));
  console.log(chalk.dim('  Scan marked Python blocks, collect suggestions, apply them with backups.\n'));
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.log(chalk.red(`\n  ✗ ${errorMessage(error)}\n`));
    process.exit(1);
  });
}
