/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 * The probe report line itself is never styled: scripts parse it.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  // Main message
  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(output.message));
  }

  // Details
  if (output.details && output.details.length > 0) {
    output.details.forEach(detail => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  // Suggestions
  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach(suggestion => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * Format a CliResult to a styled string.
 * Probe reports are written verbatim by printResult and format to ''.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);

    case 'probe_report':
      return '';
  }
}

/**
 * Format the debug view of the outcome map (buffer and write caret).
 */
export function formatDebugMap(debugMap: string): string {
  return chalk.gray(debugMap);
}

/**
 * Print a CliResult to console.
 */
export function printResult(result: CliResult): void {
  if (result.kind === 'probe_report') {
    if (result.report) process.stdout.write(result.report);
    if (result.debugMap !== undefined) console.error(formatDebugMap(result.debugMap));
    return;
  }

  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}
