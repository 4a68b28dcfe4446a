/**
 * Describe Command
 *
 * Parses an exit condition and explains what it does.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { AppConfig } from '../../config/app-config.js';
import { parseExitCondition } from '../../exit-condition/parser.js';
import { describeExitCondition } from '../../exit-condition/describe.js';
import { syntaxFailure } from './syntax-failure.js';

export interface DescribeCommandDeps {
  readonly config: AppConfig;
}

export function executeDescribeCommand(condition: string, deps: DescribeCommandDeps): CliResult {
  const result = parseExitCondition(condition, { defaultMapCapacity: deps.config.map.defaultCapacity });
  if (result.isErr()) return syntaxFailure(result.error);

  return success({
    message: `Exit condition '${condition}'`,
    details: describeExitCondition(result.value),
  });
}
