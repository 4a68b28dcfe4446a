import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'ExitConditionSyntax':
    case 'ProbeContractViolation':
      return error.message;

    case 'OutcomePatternInvalid':
      return `${error.message}\n${error.issues.map((i) => `  - ${i}`).join('\n')}`;

    default:
      return assertNever(error);
  }
}
