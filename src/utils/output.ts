/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a block of preformatted text, colouring its markers
 */
export function printText(text: string): void {
  for (const line of text.split('\n')) {
    if (line.trimStart().startsWith('⚠')) {
      console.log(chalk.yellow(line));
    } else if (/^\d+\. /.test(line)) {
      console.log(chalk.bold(line));
    } else if (line.trimStart().startsWith('- ')) {
      console.log(chalk.gray(line));
    } else {
      console.log(line);
    }
  }
}

/**
 * Print a property change list (`+` added, `~` kept, `-` removed)
 */
export function printChanges(changes: { kind: 'added' | 'kept' | 'removed'; path: string }[]): void {
  for (const change of changes) {
    switch (change.kind) {
      case 'added':
        console.log(chalk.green(`  + ${change.path}`));
        break;
      case 'kept':
        console.log(chalk.yellow(`  ~ ${change.path}`));
        break;
      case 'removed':
        console.log(chalk.red(`  - ${change.path}`));
        break;
    }
  }
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose output never goes to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
