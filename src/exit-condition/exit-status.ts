import type { ExitConditionSpec } from './types.js';

/**
 * Exit status override carried through a run.
 *
 * Transitions only move forward: disabled → armed_unmet → armed_met.
 */
export type ExitStatus =
  | { readonly kind: 'disabled' }
  | { readonly kind: 'armed_unmet' }
  | { readonly kind: 'armed_met' };

export const EXIT_STATUS_DISABLED: ExitStatus = { kind: 'disabled' };

/** Numeric codes the translator is allowed to rewrite. */
const TRANSLATABLE_EXIT_CODES: ReadonlySet<number> = new Set([0, 1]);

export function initialExitStatus(spec: ExitConditionSpec): ExitStatus {
  return spec.report.exitStatus ? { kind: 'armed_unmet' } : EXIT_STATUS_DISABLED;
}

/** Record that the condition was met. A disabled status stays disabled. */
export function markExitStatusMet(status: ExitStatus): ExitStatus {
  return status.kind === 'armed_unmet' ? { kind: 'armed_met' } : status;
}

/**
 * Map the tool's own exit code to the condition outcome.
 *
 * Only the normal codes (0 and 1) are rewritten, and only when armed.
 * Anything else is a fatal or usage error and passes through.
 */
export function translateExitCode(code: number, status: ExitStatus): number {
  if (status.kind === 'disabled') return code;
  if (!TRANSLATABLE_EXIT_CODES.has(code)) return code;
  return status.kind === 'armed_met' ? 0 : 1;
}
