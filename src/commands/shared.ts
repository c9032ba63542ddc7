/**
 * Argument parsers and output helpers shared by the commands.
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { ScanIssue } from '../scanner/scanner.js';

export function parseTaskId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidArgumentError('Not a task id.');
  }
  return id;
}

/** Variadic form of parseTaskId. */
export function parseTaskIds(value: string, previous: number[] = []): number[] {
  return [...previous, parseTaskId(value)];
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return n;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function printIssues(issues: ScanIssue[]): void {
  for (const issue of issues) {
    console.log(chalk.yellow(`  ⚠ ${issue.message}`));
  }
}

export function printDiff(diff: string): void {
  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      console.log(chalk.dim(line));
    } else if (line.startsWith('+')) {
      console.log(chalk.green(line));
    } else if (line.startsWith('-')) {
      console.log(chalk.red(line));
    } else if (line.startsWith('@@')) {
      console.log(chalk.cyan(line));
    } else {
      console.log(line);
    }
  }
}
