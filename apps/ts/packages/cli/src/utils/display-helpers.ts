/**
 * Display Helpers
 * Common display patterns for CLI commands
 */

import type { StatusSnapshot } from '@flexreport/shared';
import chalk from 'chalk';

const SEPARATOR_WIDTH = 60;

/**
 * Display a section header with separator lines
 */
export function displayHeader(title: string): void {
  console.log(`\n${chalk.bold('='.repeat(SEPARATOR_WIDTH))}`);
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(SEPARATOR_WIDTH)));
}

/**
 * Display a section footer
 */
export function displayFooter(): void {
  console.log(`${chalk.bold('='.repeat(SEPARATOR_WIDTH))}\n`);
}

/**
 * Display a key-value pair with optional indentation
 */
export function displayKeyValue(key: string, value: string, indent = 2): void {
  const spaces = ' '.repeat(indent);
  console.log(chalk.white(`${spaces}${key}: ${value}`));
}

/**
 * Display a list of items with bullet points
 */
export function displayList(items: string[], options?: { color?: 'red' | 'yellow' | 'gray'; maxItems?: number }): void {
  const { color = 'gray', maxItems = 10 } = options ?? {};
  const colorFn = color === 'red' ? chalk.red : color === 'yellow' ? chalk.yellow : chalk.gray;

  for (const item of items.slice(0, maxItems)) {
    console.log(colorFn(`  • ${item}`));
  }

  if (items.length > maxItems) {
    console.log(colorFn(`  ... and ${items.length - maxItems} more`));
  }
}

export function displaySuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function displayWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`));
}

export function displayError(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
}

/**
 * Colour a report status for terminal output
 */
export function formatStatus(status: StatusSnapshot['status'], rawStatus: string): string {
  switch (status) {
    case 'COMPLETED':
      return chalk.green(rawStatus);
    case 'FAILED':
      return chalk.red(rawStatus);
    case 'QUEUED':
      return chalk.yellow(rawStatus);
    case 'RUNNING':
      return chalk.cyan(rawStatus);
  }
}
