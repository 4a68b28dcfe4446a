import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { ProbeContractViolationError } from '../errors/app-error.js';
import type { ExitConditionTracker } from '../exit-condition/tracker.js';
import type { ProbeCounters, ProbeOutcome } from '../exit-condition/types.js';

export type ProbeStopReason = 'condition_met' | 'count_reached' | 'outcomes_exhausted';

export interface ProbeSessionOptions {
  readonly outcomes: readonly ProbeOutcome[];
  readonly tracker: ExitConditionTracker;
  /** Stop after this many probes, like `ping -c` */
  readonly count?: number;
  readonly logger?: Logger;
}

export interface ProbeSessionSummary {
  readonly counters: ProbeCounters;
  readonly stoppedBy: ProbeStopReason;
}

/**
 * Replay probe outcomes through the exit condition.
 *
 * Stands in for a real probe loop: each outcome is one completed probe that
 * bumps `transmitted` and, on a reply, `received`; the tracker is evaluated
 * after every probe and the session ends as soon as the condition is met.
 */
export function runProbeSession(options: ProbeSessionOptions): Result<ProbeSessionSummary, ProbeContractViolationError> {
  const { outcomes, tracker, logger } = options;
  const limit = options.count ?? Number.POSITIVE_INFINITY;

  let transmitted = 0;
  let received = 0;

  for (const outcome of outcomes) {
    if (transmitted >= limit) {
      return ok(finish({ transmitted, received }, 'count_reached', logger));
    }

    transmitted++;
    if (outcome === 'success') received++;

    const evaluation = tracker.update({ transmitted, received });
    if (evaluation.isErr()) return err(evaluation.error);

    logger?.trace({ seq: transmitted, outcome, evaluation: evaluation.value }, 'Probe evaluated');

    if (evaluation.value.conditionMet) {
      return ok(finish({ transmitted, received }, 'condition_met', logger));
    }
  }

  const stoppedBy: ProbeStopReason = transmitted >= limit ? 'count_reached' : 'outcomes_exhausted';
  return ok(finish({ transmitted, received }, stoppedBy, logger));
}

/**
 * The probing tool's own exit code: 0 when at least one reply came back.
 */
export function probeExitCode(counters: ProbeCounters): number {
  return counters.received > 0 ? 0 : 1;
}

function finish(counters: ProbeCounters, stoppedBy: ProbeStopReason, logger?: Logger): ProbeSessionSummary {
  logger?.debug({ ...counters, stoppedBy }, 'Probe session finished');
  return { counters, stoppedBy };
}
