/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';
import type { ExitStatus } from '../../exit-condition/exit-status.js';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Final state of a probe run.
 * The exit code is the probing tool's own code, before exit condition translation.
 */
export interface ProbeReportOutput {
  readonly toolExitCode: number;
  readonly exitStatus: ExitStatus;
  /** Report line including its terminator, or '' when none was requested */
  readonly report: string;
  readonly debugMap?: string;
}

/**
 * Result of a CLI command execution.
 * All commands should return this type.
 */
export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput }
  | ({ kind: 'probe_report' } & ProbeReportOutput);

/**
 * Helper to create a success result.
 */
export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/**
 * Helper to create a failure result.
 */
export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Helper to create a misuse failure (bad arguments, etc).
 */
export function misuse(message: string, options?: { details?: readonly string[]; suggestions?: readonly string[] }): CliResult {
  return failure(message, { ...options, exitCode: { kind: 'misuse' } });
}

/**
 * Helper to create a probe run result.
 */
export function probeReport(output: ProbeReportOutput): CliResult {
  return { kind: 'probe_report', ...output };
}
