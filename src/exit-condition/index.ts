export type {
  CountingMode,
  LocationMode,
  MapGlyphs,
  MapReportOptions,
  ReportOptions,
  ExitConditionSpec,
  ProbeOutcome,
  ProbeCounters,
} from './types.js';
export {
  DEFAULT_MAP_GLYPHS,
  DEFAULT_MAP_MAX_CAPACITY,
  DEFAULT_MAP_INITIAL_CEILING,
  DEFAULT_MAP_GROWTH_STEP,
} from './types.js';

export type { ParseExitConditionOptions, ParseResult } from './parser.js';
export { parseExitCondition } from './parser.js';

export type { RingMapOptions, RingMapState } from './ring-map.js';
export { RingMap } from './ring-map.js';

export type { ExitConditionTrackerOptions, EvaluationOutcome, ExitConditionSnapshot } from './tracker.js';
export { ExitConditionTracker } from './tracker.js';

export type { FormatReportOptions } from './report.js';
export { formatReport, hasReportFields, DEFAULT_REPORT_LABEL } from './report.js';

export type { ExitStatus } from './exit-status.js';
export { EXIT_STATUS_DISABLED, initialExitStatus, markExitStatusMet, translateExitCode } from './exit-status.js';

export { describeExitCondition } from './describe.js';
