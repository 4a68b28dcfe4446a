export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  ExitConditionSyntaxError,
  ProbeContractViolationError,
  OutcomePatternInvalidError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
