/**
 * Runtime mode of the current process.
 * Decided once at the composition root and registered in the container.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
