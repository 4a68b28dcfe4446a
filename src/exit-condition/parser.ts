import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ExitConditionSyntaxError } from '../errors/app-error.js';
import { assertNever } from '../runtime/assert-never.js';
import {
  DEFAULT_MAP_GLYPHS,
  DEFAULT_MAP_MAX_CAPACITY,
  type CountingMode,
  type ExitConditionSpec,
  type LocationMode,
  type MapGlyphs,
  type MapReportOptions,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ParseResult<T> = Result<T, ExitConditionSyntaxError>;

export interface ParseExitConditionOptions {
  /** Map capacity used by `m` when no size argument is given. */
  readonly defaultMapCapacity?: number;
}

type OptionLetter = 'x' | 'n' | 'N' | 'm' | 'q' | 'c';
type Modifier = '+' | '-';

const OPTION_LETTERS: readonly OptionLetter[] = ['x', 'n', 'N', 'm', 'q', 'c'];

interface Draft {
  expect: number;
  counting: CountingMode;
  location: LocationMode;
  exitStatus: boolean;
  showSuccessCount: boolean;
  showFailureCount: boolean;
  showState: boolean;
  silent: boolean;
  map: MapReportOptions | null;
}

interface ArgumentSpan {
  /** Index of the first character after `(` */
  readonly start: number;
  /** Index of the closing `)` */
  readonly end: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse an exit condition: `<count><loc>[:<opt>+]`.
 *
 * - `<count>`: optional leading `-` (count failures) and decimal digits
 * - `<loc>`: optional `s` (consecutive outcomes)
 * - `<opt>`: any of `x n N m q c`; `n` takes a `+`/`-` prefix and `m` takes
 *   `(<size>[:<success glyph><failure glyph>])`
 *
 * Examples: `3:x`, `-5s:xN`, `10:m(200:.x)`.
 */
export function parseExitCondition(
  text: string,
  options: ParseExitConditionOptions = {}
): ParseResult<ExitConditionSpec> {
  const defaultMapCapacity = options.defaultMapCapacity ?? DEFAULT_MAP_MAX_CAPACITY;
  const draft: Draft = {
    expect: 0,
    counting: 'success',
    location: 'cumulative',
    exitStatus: false,
    showSuccessCount: false,
    showFailureCount: false,
    showState: false,
    silent: false,
    map: null,
  };

  let phase: 'count' | 'location' | 'options' = 'count';
  let pos = 0;

  while (pos < text.length) {
    const c = text.charAt(pos);

    if (phase === 'count') {
      if (pos === 0 && c === '-') {
        draft.counting = 'failure';
        pos++;
        continue;
      }
      if (isDigit(c)) {
        draft.expect = draft.expect * 10 + Number(c);
        if (!Number.isSafeInteger(draft.expect)) {
          return err(Err.exitConditionSyntax(text, pos, 'expected count is too large'));
        }
        pos++;
        continue;
      }
      if (pos === 0) {
        return err(Err.exitConditionSyntax(text, pos, `unexpected character '${c}' at start`));
      }
      phase = 'location';
    }

    if (phase === 'location') {
      if (c === ':') {
        phase = 'options';
        pos++;
        continue;
      }
      if (c === 's') {
        if (draft.location === 'sequence') {
          return err(Err.exitConditionSyntax(text, pos, `repeat loc flag '${c}'`));
        }
        draft.location = 'sequence';
        pos++;
        continue;
      }
      return err(Err.exitConditionSyntax(text, pos, `expect ':', got '${c}'`));
    }

    const consumed = parseOption(text, pos, draft, defaultMapCapacity);
    if (consumed.isErr()) return err(consumed.error);
    pos = consumed.value + 1;
  }

  if (draft.expect < 1) {
    return err(
      Err.exitConditionSyntax(text, 0, 'exit condition must define an expected count different from zero')
    );
  }

  return ok(toSpec(text, draft));
}

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse one option starting at `pos` and apply it to the draft.
 * Returns the index of the last character consumed.
 */
function parseOption(
  text: string,
  pos: number,
  draft: Draft,
  defaultMapCapacity: number
): ParseResult<number> {
  let p = pos;
  let modifier: Modifier | null = null;
  let letter = text.charAt(p);

  if (letter === '+' || letter === '-') {
    modifier = letter;
    p++;
    letter = text.charAt(p);
  }
  if (p >= text.length) {
    return err(Err.exitConditionSyntax(text, p, 'unexpected end of option string'));
  }
  if (!isOptionLetter(letter)) {
    return err(Err.exitConditionSyntax(text, p, `invalid option '${letter}'`));
  }
  if (modifier !== null && letter !== 'n') {
    return err(Err.exitConditionSyntax(text, p, "+/- modifiers only allowed for 'n' option"));
  }

  let args: ArgumentSpan | null = null;
  if (text.charAt(p + 1) === '(') {
    const start = p + 2;
    const end = text.indexOf(')', start);
    if (end < 0) {
      return err(Err.exitConditionSyntax(text, text.length, "unexpected end-of-string looking for ')'"));
    }
    args = { start, end };
    p = end;
  }

  if (args !== null && letter !== 'm') {
    return err(Err.exitConditionSyntax(text, args.start, `option '${letter}' does not expect arguments`));
  }

  switch (letter) {
    case 'x':
      draft.exitStatus = true;
      break;
    case 'n': {
      const which = modifier ?? (draft.counting === 'failure' ? '+' : '-');
      if (which === '+') draft.showSuccessCount = true;
      else draft.showFailureCount = true;
      break;
    }
    case 'N':
      draft.showSuccessCount = true;
      draft.showFailureCount = true;
      break;
    case 'm': {
      const map = args === null
        ? ok<MapReportOptions, ExitConditionSyntaxError>({ maxCapacity: defaultMapCapacity, glyphs: DEFAULT_MAP_GLYPHS })
        : parseMapArguments(text, args, defaultMapCapacity);
      if (map.isErr()) return err(map.error);
      draft.map = map.value;
      break;
    }
    case 'q':
      draft.silent = true;
      break;
    case 'c':
      draft.showState = true;
      break;
    default:
      return assertNever(letter);
  }

  return ok(p);
}

/**
 * `<size>[:<success glyph><failure glyph>]` between the parentheses of `m`.
 */
function parseMapArguments(
  text: string,
  args: ArgumentSpan,
  defaultMapCapacity: number
): ParseResult<MapReportOptions> {
  if (args.start === args.end) {
    return err(Err.exitConditionSyntax(text, args.start, "empty argument list for option 'm'"));
  }

  let size = 0;
  let digits = 0;
  let p = args.start;

  for (; p < args.end; p++) {
    const c = text.charAt(p);
    if (isDigit(c)) {
      size = size * 10 + Number(c);
      digits++;
      if (!Number.isSafeInteger(size)) {
        return err(Err.exitConditionSyntax(text, p, "'m' arg map size is too large"));
      }
      continue;
    }
    if (c !== ':') {
      return err(
        Err.exitConditionSyntax(text, p, `invalid character (${c}) in args to option 'm', expecting digit or ':'`)
      );
    }
    break;
  }

  if (digits > 0 && size < 1) {
    return err(Err.exitConditionSyntax(text, p, "'m' arg map size must be >0"));
  }

  let glyphs: MapGlyphs = DEFAULT_MAP_GLYPHS;
  if (p < args.end) {
    const glyphStart = p + 1;
    if (args.end - glyphStart !== 2) {
      return err(
        Err.exitConditionSyntax(text, glyphStart, "expecting exactly 2 characters after ':' in 'm' args")
      );
    }
    glyphs = { success: text.charAt(glyphStart), failure: text.charAt(glyphStart + 1) };
  }

  return ok({ maxCapacity: digits > 0 ? size : defaultMapCapacity, glyphs });
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9' && c.length === 1;
}

function isOptionLetter(c: string): c is OptionLetter {
  return OPTION_LETTERS.some((letter) => letter === c);
}

function toSpec(source: string, draft: Draft): ExitConditionSpec {
  return {
    source,
    expect: draft.expect,
    counting: draft.counting,
    location: draft.location,
    report: {
      exitStatus: draft.exitStatus,
      showSuccessCount: draft.showSuccessCount,
      showFailureCount: draft.showFailureCount,
      showState: draft.showState,
      silent: draft.silent,
      ...(draft.map === null ? {} : { map: draft.map }),
    },
  };
}
