import type { CliResult } from '../types/cli-result.js';
import { misuse } from '../types/cli-result.js';
import type { ExitConditionSyntaxError } from '../../errors/app-error.js';

export const EXIT_CONDITION_SYNTAX_HELP: readonly string[] = [
  'Syntax: [-]<count>[s][:<options>]',
  "Options: x (exit status), n/+n/-n (one count), N (both counts), m[(<size>[:<success><failure>])] (map), q (no label), c (T/F state)",
];

/**
 * Usage failure for an exit condition that does not parse.
 */
export function syntaxFailure(error: ExitConditionSyntaxError): CliResult {
  return misuse(error.message, { suggestions: EXIT_CONDITION_SYNTAX_HELP });
}
