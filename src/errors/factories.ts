import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ExitConditionSyntaxError,
  OutcomePatternInvalidError,
  ProbeContractViolationError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  /** `position` is the 0-based index into `input`. */
  exitConditionSyntax: (input: string, position: number, reason: string): ExitConditionSyntaxError => {
    const character = input[position];
    return {
      _tag: 'ExitConditionSyntax',
      input,
      column: position + 1,
      ...(character === undefined ? {} : { character }),
      reason,
      message: `exit condition parsing error '${input}'@${position + 1}: ${reason}`,
    };
  },

  probeContractViolation: (deltaSuccess: number, deltaFailure: number): ProbeContractViolationError => ({
    _tag: 'ProbeContractViolation',
    code: 'PROBE_COUNTERS_NOT_SINGLE_STEP',
    deltaSuccess,
    deltaFailure,
    message:
      `Probe counters must advance by exactly one completed probe per evaluation ` +
      `(got ${deltaSuccess} successes, ${deltaFailure} failures)`,
  }),

  outcomePatternInvalid: (pattern: string, issues: readonly string[]): OutcomePatternInvalidError => ({
    _tag: 'OutcomePatternInvalid',
    pattern,
    issues,
    message: `Invalid outcome pattern '${pattern}'`,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
