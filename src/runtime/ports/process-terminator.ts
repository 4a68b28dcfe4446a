/**
 * Port for terminating the current process.
 * This should only be used by composition roots / entrypoints.
 *
 * Takes the final numeric code: exit conditions may rewrite 0/1, and
 * usage or internal errors carry their own codes.
 */
export interface ProcessTerminator {
  terminate(code: number): never;
}
