import type { ExitConditionSpec } from './types.js';

/**
 * Human-readable summary of a parsed exit condition, one fact per line.
 */
export function describeExitCondition(spec: ExitConditionSpec): string[] {
  const outcome = spec.counting === 'success' ? 'successful' : 'failed';
  const plural = spec.expect === 1 ? 'probe' : 'probes';
  const lines = [
    spec.location === 'sequence'
      ? `Met after ${spec.expect} consecutive ${outcome} ${plural}`
      : `Met after ${spec.expect} ${outcome} ${plural} in total`,
  ];

  const { report } = spec;
  const fields: string[] = [];
  if (report.showState) fields.push('state (T/F)');
  if (report.showSuccessCount) fields.push('success count');
  if (report.showFailureCount) fields.push('failure count');
  if (report.map) fields.push('outcome map');

  lines.push(fields.length > 0 ? `Report: ${fields.join(', ')}` : 'Report: none');
  if (fields.length > 0 && report.silent) lines.push('Report label: suppressed');

  if (report.map) {
    lines.push(
      `Map: last ${report.map.maxCapacity} outcomes, ` +
        `'${report.map.glyphs.success}' success, '${report.map.glyphs.failure}' failure`
    );
  }

  lines.push(
    report.exitStatus
      ? 'Exit status: 0 when met, 1 when not met'
      : 'Exit status: unchanged'
  );
  return lines;
}
