/**
 * Run Command
 *
 * Replays a probe outcome pattern through an exit condition and reports.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { misuse, failure, probeReport } from '../types/cli-result.js';
import type { AppConfig } from '../../config/app-config.js';
import type { ILoggerFactory } from '../../core/logging/types.js';
import { parseExitCondition } from '../../exit-condition/parser.js';
import { ExitConditionTracker } from '../../exit-condition/tracker.js';
import { formatReport } from '../../exit-condition/report.js';
import { parseOutcomePattern } from '../../probe/outcome-pattern.js';
import { runProbeSession, probeExitCode } from '../../probe/probe-session.js';
import { syntaxFailure } from './syntax-failure.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RunCommandInput {
  readonly condition: string;
  readonly outcomes: string;
  readonly count?: number;
  readonly debugMap?: boolean;
  /** Print the label line even when the condition requests no field */
  readonly forceReport?: boolean;
}

export interface RunCommandDeps {
  readonly config: AppConfig;
  readonly loggerFactory: ILoggerFactory;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the run command.
 */
export function executeRunCommand(input: RunCommandInput, deps: RunCommandDeps): CliResult {
  const specResult = parseExitCondition(input.condition, {
    defaultMapCapacity: deps.config.map.defaultCapacity,
  });
  if (specResult.isErr()) return syntaxFailure(specResult.error);

  const outcomesResult = parseOutcomePattern(input.outcomes);
  if (outcomesResult.isErr()) {
    return misuse(outcomesResult.error.message, {
      details: outcomesResult.error.issues,
      suggestions: ["Use '+' for a reply and '-' for a lost probe, e.g. --outcomes=++-+"],
    });
  }

  if (input.count !== undefined && (!Number.isSafeInteger(input.count) || input.count < 1)) {
    return misuse(`Invalid probe count: ${input.count}`, {
      suggestions: ['Pass a positive integer to --count'],
    });
  }

  const logger = deps.loggerFactory.create('run');
  const tracker = new ExitConditionTracker(specResult.value, {
    mapInitialCeiling: deps.config.map.initialCeiling,
    mapGrowthStep: deps.config.map.growthStep,
    logger: deps.loggerFactory.create('exit-condition'),
  });

  const session = runProbeSession({
    outcomes: outcomesResult.value,
    tracker,
    count: input.count,
    logger,
  });
  if (session.isErr()) {
    return failure(session.error.message, { exitCode: { kind: 'internal_error' } });
  }

  const report = formatReport(tracker.snapshot(), {
    label: deps.config.report.label,
    force: input.forceReport,
  });

  return probeReport({
    toolExitCode: probeExitCode(session.value.counters),
    exitStatus: tracker.exitStatus,
    report,
    ...(input.debugMap ? { debugMap: tracker.map ? tracker.map.renderDebug() : '(no outcome map requested)' } : {}),
  });
}
