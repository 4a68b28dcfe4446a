import type { DestinationStream } from 'pino';
import { createRootLogger, type Logger } from '../../src/core/logging/index.js';

export interface CapturedLogEntry {
  readonly level: number;
  readonly msg?: string;
  readonly [key: string]: unknown;
}

/**
 * Real pino logger writing JSON lines into memory.
 * Fakes over mocks: assertions read what pino actually emitted.
 */
export class LogCapture implements DestinationStream {
  readonly lines: string[] = [];
  readonly logger: Logger;

  constructor(level: 'trace' | 'debug' | 'info' | 'warn' = 'debug') {
    this.logger = createRootLogger(level, this);
  }

  write(msg: string): void {
    this.lines.push(msg);
  }

  entries(): CapturedLogEntry[] {
    return this.lines.map((line) => {
      const entry: CapturedLogEntry = JSON.parse(line);
      return entry;
    });
  }

  messages(): (string | undefined)[] {
    return this.entries().map((e) => e.msg);
  }
}
