import type { ExitConditionSnapshot } from './tracker.js';
import type { ExitConditionSpec } from './types.js';

export const DEFAULT_REPORT_LABEL = 'exit-cond';

export interface FormatReportOptions {
  /** Emit the line even when no report field was requested. */
  readonly force?: boolean;
  readonly label?: string;
}

export function hasReportFields(spec: ExitConditionSpec): boolean {
  const r = spec.report;
  return r.showState || r.showSuccessCount || r.showFailureCount || r.map !== undefined;
}

/**
 * Render the final report line:
 * `[<label>:]<state>/<successes>/<failures>/<map>\n`, with absent fields
 * and their separators left out.
 *
 * Returns '' when nothing was requested and `force` is not set.
 */
export function formatReport(snapshot: ExitConditionSnapshot, options: FormatReportOptions = {}): string {
  const { spec } = snapshot;
  if (!options.force && !hasReportFields(spec)) return '';

  const fields: string[] = [];
  if (spec.report.showState) fields.push(snapshot.conditionMet ? 'T' : 'F');
  if (spec.report.showSuccessCount) fields.push(String(snapshot.successes));
  if (spec.report.showFailureCount) fields.push(String(snapshot.failures));
  if (snapshot.map !== null) fields.push(snapshot.map);

  const label = spec.report.silent ? '' : `${options.label ?? DEFAULT_REPORT_LABEL}:`;
  return `${label}${fields.join('/')}\n`;
}
