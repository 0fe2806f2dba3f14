/**
 * Output formatting utilities for CLI
 *
 * Everything is written to stderr; stdout belongs to the STATE stream.
 */

import chalk from 'chalk';
import type { StreamCounts, SyncSummary } from '../services/target/index.js';

export function printError(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

/**
 * One line per stream: created / updated / skipped / failed
 */
export function formatStreamLine(stream: string, counts: StreamCounts): string {
  const failed = counts.failed > 0 ? chalk.red(`${counts.failed} failed`) : chalk.dim('0 failed');
  return `${stream}: ${chalk.green(`${counts.created} created`)}, ${counts.updated} updated, ${counts.skipped} skipped, ${failed}`;
}

export function printSummary(summary: SyncSummary): void {
  const title = 'Sharpi sync';
  console.error(chalk.bold.cyan(`\n${title}`));
  console.error(chalk.dim('─'.repeat(title.length + 4)));
  console.error(`  ${chalk.gray('Records'.padEnd(18))} ${summary.records}`);
  for (const [stream, counts] of Object.entries(summary.streams)) {
    console.error(`  ${formatStreamLine(stream, counts)}`);
  }
  if (summary.failed > 0) {
    console.error(chalk.yellow(`! ${summary.failed} record(s) failed`));
  } else {
    console.error(chalk.green('✓ All records pushed'));
  }
}
