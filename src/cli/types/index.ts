/**
 * CLI Types - Public API
 */

export type { ExitCode } from './exit-code.js';
export { toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult, ProbeReportOutput } from './cli-result.js';
export { success, failure, misuse, probeReport } from './cli-result.js';
