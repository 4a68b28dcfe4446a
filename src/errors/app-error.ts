export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * The exit condition option text does not follow the grammar.
 * `column` is 1-based; `character` is absent when the text ended early.
 */
export type ExitConditionSyntaxError = Readonly<{
  readonly _tag: 'ExitConditionSyntax';
  readonly input: string;
  readonly column: number;
  readonly character?: string;
  readonly reason: string;
  readonly message: string;
}>;

/**
 * The probe loop advanced its counters by something other than exactly one
 * completed probe between two evaluations.
 */
export type ProbeContractViolationError = Readonly<{
  readonly _tag: 'ProbeContractViolation';
  readonly code: 'PROBE_COUNTERS_NOT_SINGLE_STEP';
  readonly deltaSuccess: number;
  readonly deltaFailure: number;
  readonly message: string;
}>;

export type OutcomePatternInvalidError = Readonly<{
  readonly _tag: 'OutcomePatternInvalid';
  readonly pattern: string;
  readonly issues: readonly string[];
  readonly message: string;
}>;

export type AppError =
  | ConfigInvalidError
  | ExitConditionSyntaxError
  | ProbeContractViolationError
  | OutcomePatternInvalidError;
