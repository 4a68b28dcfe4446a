/**
 * CLI Commands - Public API
 */

export { executeRunCommand } from './run.js';
export type { RunCommandInput, RunCommandDeps } from './run.js';

export { executeDescribeCommand } from './describe.js';
export type { DescribeCommandDeps } from './describe.js';
