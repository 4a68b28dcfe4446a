/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }         // 0 - successful execution
  | { kind: 'general_error' }   // 1 - general errors
  | { kind: 'misuse' }          // 2 - misuse of command (bad args, bad exit condition)
  | { kind: 'internal_error' }; // 3 - broken internal contract (never rewritten by exit conditions)

/**
 * Convert ExitCode to numeric value for the process terminator.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'internal_error':
      return 3;
  }
}
