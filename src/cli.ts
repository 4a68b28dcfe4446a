#!/usr/bin/env node
/**
 * probecond CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { ILoggerFactory } from './core/logging/types.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { formatAppError } from './errors/formatter.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import { executeRunCommand, executeDescribeCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// COMPOSITION
// ═══════════════════════════════════════════════════════════════════════════

interface Wiring {
  readonly config: ValidatedConfig;
  readonly loggerFactory: ILoggerFactory;
  readonly terminator: ProcessTerminator;
}

function wire(): Wiring {
  const init = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (init.isErr()) {
    // Without a container there is no terminator to resolve yet.
    interpretCliResult(failure(formatAppError(init.error)), new NodeProcessTerminator());
  }

  return {
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    loggerFactory: container.resolve<ILoggerFactory>(DI.Logging.Factory),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

interface RunOptions {
  readonly exitCond: string;
  readonly outcomes: string;
  readonly count?: number;
  readonly debugMap?: boolean;
  readonly forceReport?: boolean;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('probecond')
    .description('Exit conditions for probing tools: stop on a pattern of replies and losses')
    .version('0.1.0');

  program
    .command('run')
    .description('Replay probe outcomes through an exit condition and print its report')
    .requiredOption('-x, --exit-cond <condition>', 'exit condition, e.g. 3:x, -5s:xN, 10:m(200:.x)')
    .requiredOption('--outcomes <pattern>', "probe outcomes, '+' reply and '-' lost, e.g. --outcomes=++-+")
    .option('-c, --count <n>', 'stop after n probes', (value: string) => Number(value))
    .option('--debug-map', 'print the raw outcome map with its write position to stderr')
    .option('--force-report', 'print the report label even when the condition requests no field')
    .action((options: RunOptions) => {
      const { config, loggerFactory, terminator } = wire();

      const result = executeRunCommand(
        {
          condition: options.exitCond,
          outcomes: options.outcomes,
          count: options.count,
          debugMap: options.debugMap,
          forceReport: options.forceReport,
        },
        { config, loggerFactory }
      );

      interpretCliResult(result, terminator);
    });

  program
    .command('describe')
    .description('Explain what an exit condition does')
    .requiredOption('-x, --exit-cond <condition>', 'exit condition to explain')
    .action((options: { exitCond: string }) => {
      const { config, terminator } = wire();
      interpretCliResult(executeDescribeCommand(options.exitCond, { config }), terminator);
    });

  return program;
}

createProgram().parse(process.argv);
