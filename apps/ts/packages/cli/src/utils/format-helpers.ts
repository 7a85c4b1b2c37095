/**
 * Format Helpers
 * Common formatting utilities for CLI commands
 */

import { logger } from '@flexreport/shared';
import chalk from 'chalk';

/**
 * Format file size in human readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${(bytes / k ** i).toFixed(1)} ${sizes[i]}`;
}

/**
 * Pluralize a count: `formatCount(1, 'group')` is "1 group"
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Log debug message if debug mode is enabled
 */
export function logDebug(debug: boolean, message: string): void {
  if (debug) console.log(chalk.gray(`[DEBUG] ${message}`));
}

/**
 * --debug also turns on DEBUG output from the API clients
 */
export function applyDebugFlag(debug: boolean): void {
  if (debug) logger.setLevel('DEBUG');
}
