/**
 * Exit condition types.
 *
 * An ExitConditionSpec is the parsed, immutable form of an option string
 * such as `-5s:xNm(200:.x)`. Runtime state lives in ExitConditionTracker.
 */

/** Which probe outcome the condition counts. */
export type CountingMode = 'success' | 'failure';

/** Whether `expect` outcomes must be consecutive. */
export type LocationMode = 'cumulative' | 'sequence';

export interface MapGlyphs {
  readonly success: string;
  readonly failure: string;
}

export interface MapReportOptions {
  readonly maxCapacity: number;
  readonly glyphs: MapGlyphs;
}

export interface ReportOptions {
  /** `x`: exit status reflects condition met/unmet */
  readonly exitStatus: boolean;
  readonly showSuccessCount: boolean;
  readonly showFailureCount: boolean;
  /** `c`: print `T`/`F` */
  readonly showState: boolean;
  /** `q`: no label before the report fields */
  readonly silent: boolean;
  /** `m`: absent unless a map was requested */
  readonly map?: MapReportOptions;
}

export interface ExitConditionSpec {
  readonly source: string;
  readonly expect: number;
  readonly counting: CountingMode;
  readonly location: LocationMode;
  readonly report: ReportOptions;
}

export type ProbeOutcome = 'success' | 'failure';

/** Cumulative totals supplied by the probe loop after each completed probe. */
export interface ProbeCounters {
  readonly transmitted: number;
  readonly received: number;
}

export const DEFAULT_MAP_GLYPHS: MapGlyphs = { success: '+', failure: '-' };

export const DEFAULT_MAP_MAX_CAPACITY = 100;
export const DEFAULT_MAP_INITIAL_CEILING = 512;
export const DEFAULT_MAP_GROWTH_STEP = 512;
