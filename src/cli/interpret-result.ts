/**
 * CLI Result Interpreter
 *
 * Bridges CLI command results to process termination.
 * This is the only place where CliResult is converted to process exit,
 * and the only place exit conditions rewrite the exit code.
 */

import type { CliResult } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { translateExitCode } from '../exit-condition/exit-status.js';
import { printResult } from './output-formatter.js';

/**
 * Final numeric exit code for a result.
 */
export function resolveExitCode(result: CliResult): number {
  switch (result.kind) {
    case 'success':
      return 0;

    case 'failure':
      return toNumericExitCode(result.exitCode);

    case 'probe_report':
      return translateExitCode(result.toolExitCode, result.exitStatus);
  }
}

/**
 * Interpret a CLI result and handle termination via ProcessTerminator.
 *
 * @param result - The CLI command result
 * @param terminator - The process terminator from DI
 */
export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator
): void {
  printResult(result);

  const code = resolveExitCode(result);
  // Don't explicitly exit on success; let the process end naturally.
  if (code === 0) return;

  terminator.terminate(code);
}
