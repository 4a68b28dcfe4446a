import type { ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * Useful to catch accidental termination during tests.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: number): never {
    throw new ProcessTerminationRequested(code);
  }
}

export class ProcessTerminationRequested extends Error {
  constructor(readonly code: number) {
    super(`[ProcessTerminator] terminate(${code})`);
    this.name = 'ProcessTerminationRequested';
  }
}
