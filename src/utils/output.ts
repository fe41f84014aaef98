/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult } from '../types.js';
import type { LogEntry } from '../diagnostics/log.js';
import { renderEntry } from '../diagnostics/report.js';

/**
 * Print a command result as JSON
 */
export function printResult<T>(result: CommandResult<T>): void {
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Print log entries, coloured by kind
 */
export function printEntries(entries: readonly LogEntry[]): void {
  for (const entry of entries) {
    const text = renderEntry(entry).join('\n');
    switch (entry.kind) {
      case 'diagnostic':
        console.log(entry.severity === 'error' ? chalk.red(text) : chalk.yellow(text));
        break;
      case 'fragment':
        console.log(chalk.cyan(text));
        break;
      case 'note':
        console.log(chalk.gray(text));
        break;
    }
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}
