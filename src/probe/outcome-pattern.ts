import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { OutcomePatternInvalidError } from '../errors/app-error.js';
import type { ProbeOutcome } from '../exit-condition/types.js';

/**
 * Outcome pattern: `+` for a reply, `-` for a lost probe.
 * Whitespace is ignored so long patterns can be grouped (`+++ -+- +++`).
 */
const OutcomePatternSchema = z
  .string()
  .transform((s) => s.replace(/\s+/g, ''))
  .pipe(
    z
      .string()
      .min(1, 'pattern must contain at least one outcome')
      .regex(/^[+-]+$/, "pattern may only contain '+' (reply) and '-' (lost)")
  );

export function parseOutcomePattern(pattern: string): Result<readonly ProbeOutcome[], OutcomePatternInvalidError> {
  const parsed = OutcomePatternSchema.safeParse(pattern);
  if (!parsed.success) {
    return err(Err.outcomePatternInvalid(pattern, parsed.error.errors.map((issue) => issue.message)));
  }

  return ok(Array.from(parsed.data, (c): ProbeOutcome => (c === '+' ? 'success' : 'failure')));
}
