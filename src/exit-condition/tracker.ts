import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { Err } from '../errors/factories.js';
import type { ProbeContractViolationError } from '../errors/app-error.js';
import { type ExitStatus, initialExitStatus, markExitStatusMet } from './exit-status.js';
import { RingMap } from './ring-map.js';
import type { ExitConditionSpec, ProbeCounters, ProbeOutcome } from './types.js';

export interface ExitConditionTrackerOptions {
  readonly mapInitialCeiling?: number;
  readonly mapGrowthStep?: number;
  readonly logger?: Logger;
  /** Storage allocator handed to the outcome map. */
  readonly mapAllocate?: (size: number) => string[];
}

export type EvaluationOutcome =
  | { readonly kind: 'unchanged'; readonly conditionMet: boolean }
  | {
      readonly kind: 'recorded';
      readonly outcome: ProbeOutcome;
      /** Whether this probe satisfies the condition */
      readonly satisfied: boolean;
      /** True only on the probe that first satisfied it */
      readonly newlyMet: boolean;
      readonly conditionMet: boolean;
    };

/** Read-only view used by the report formatter. */
export interface ExitConditionSnapshot {
  readonly spec: ExitConditionSpec;
  readonly successes: number;
  readonly failures: number;
  readonly streak: number;
  readonly conditionMet: boolean;
  readonly exitStatus: ExitStatus;
  /** Rendered outcome map, null when no map was requested */
  readonly map: string | null;
}

/**
 * Runtime state of one exit condition.
 *
 * Fed the probe loop's cumulative counters once per completed probe; derives
 * the outcome of that probe from the difference with the previous call.
 */
export class ExitConditionTracker {
  readonly spec: ExitConditionSpec;
  readonly map: RingMap | null;

  private transmitted = 0;
  private received = 0;
  private streak = 0;
  private met = false;
  private status: ExitStatus;
  private readonly logger?: Logger;

  constructor(spec: ExitConditionSpec, options: ExitConditionTrackerOptions = {}) {
    this.spec = spec;
    this.logger = options.logger;
    this.status = initialExitStatus(spec);
    this.map = spec.report.map
      ? new RingMap({
          maxCapacity: spec.report.map.maxCapacity,
          glyphs: spec.report.map.glyphs,
          initialCeiling: options.mapInitialCeiling,
          growthStep: options.mapGrowthStep,
          logger: options.logger,
          allocate: options.mapAllocate,
        })
      : null;
  }

  get conditionMet(): boolean {
    return this.met;
  }

  get exitStatus(): ExitStatus {
    return this.status;
  }

  get successes(): number {
    return this.received;
  }

  get failures(): number {
    return this.transmitted - this.received;
  }

  /**
   * Evaluate after a completed probe.
   *
   * Counters must have advanced by exactly one probe since the previous call,
   * or not at all (reported as `unchanged`). Anything else is a contract
   * violation and leaves the state untouched.
   */
  update(counters: ProbeCounters): Result<EvaluationOutcome, ProbeContractViolationError> {
    const deltaSuccess = counters.received - this.received;
    const deltaFailure = counters.transmitted - this.transmitted - deltaSuccess;

    if (deltaSuccess === 0 && deltaFailure === 0) {
      return ok({ kind: 'unchanged', conditionMet: this.met });
    }

    const singleStep =
      (deltaSuccess === 1 && deltaFailure === 0) || (deltaSuccess === 0 && deltaFailure === 1);
    if (!singleStep) {
      this.logger?.error({ counters, deltaSuccess, deltaFailure }, 'Probe counters advanced by more than one probe');
      return err(Err.probeContractViolation(deltaSuccess, deltaFailure));
    }

    const outcome: ProbeOutcome = deltaSuccess === 1 ? 'success' : 'failure';
    this.transmitted = counters.transmitted;
    this.received = counters.received;

    this.map?.record(outcome === 'success');

    const satisfied = this.isSatisfied(outcome);
    const newlyMet = satisfied && !this.met;
    if (newlyMet) {
      this.met = true;
      this.status = markExitStatusMet(this.status);
      this.logger?.debug(
        { expect: this.spec.expect, successes: this.successes, failures: this.failures },
        'Exit condition met'
      );
    }

    return ok({ kind: 'recorded', outcome, satisfied, newlyMet, conditionMet: this.met });
  }

  snapshot(): ExitConditionSnapshot {
    return {
      spec: this.spec,
      successes: this.successes,
      failures: this.failures,
      streak: this.streak,
      conditionMet: this.met,
      exitStatus: this.status,
      map: this.map ? this.map.render() : null,
    };
  }

  private isSatisfied(outcome: ProbeOutcome): boolean {
    if (this.spec.location === 'sequence') {
      this.streak = outcome === this.spec.counting ? this.streak + 1 : 0;
      return this.streak === this.spec.expect;
    }

    const total = this.spec.counting === 'success' ? this.successes : this.failures;
    return total >= this.spec.expect;
  }
}
