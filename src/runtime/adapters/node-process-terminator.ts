import type { ProcessTerminator } from '../ports/process-terminator.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: number): never {
    process.exit(code);
  }
}
