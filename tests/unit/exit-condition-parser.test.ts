import { describe, it, expect } from 'vitest';
import { parseExitCondition } from '../../src/exit-condition/parser.js';
import { expectOk, expectErr } from '../helpers/result-helpers.js';

describe('parseExitCondition', () => {
  describe('count and location', () => {
    it('parses a bare success count', () => {
      const spec = expectOk(parseExitCondition('3'), 'parsing 3');

      expect(spec).toEqual({
        source: '3',
        expect: 3,
        counting: 'success',
        location: 'cumulative',
        report: {
          exitStatus: false,
          showSuccessCount: false,
          showFailureCount: false,
          showState: false,
          silent: false,
        },
      });
    });

    it('selects failure counting with a leading dash', () => {
      const spec = expectOk(parseExitCondition('-3'), 'parsing -3');
      expect(spec.expect).toBe(3);
      expect(spec.counting).toBe('failure');
    });

    it('accumulates multi-digit counts', () => {
      expect(expectOk(parseExitCondition('120'), 'parsing 120').expect).toBe(120);
    });

    it('selects sequence mode with s', () => {
      const spec = expectOk(parseExitCondition('3s'), 'parsing 3s');
      expect(spec.location).toBe('sequence');
      expect(spec.report.exitStatus).toBe(false);
    });

    it('arms the exit status with x after the location flag', () => {
      const spec = expectOk(parseExitCondition('3s:x'), 'parsing 3s:x');
      expect(spec.location).toBe('sequence');
      expect(spec.report.exitStatus).toBe(true);
    });

    it('accepts a trailing colon with no options', () => {
      const spec = expectOk(parseExitCondition('3:'), 'parsing 3:');
      expect(spec.report.exitStatus).toBe(false);
      expect(spec.report.map).toBeUndefined();
    });

    it('rejects a zero count at column 1', () => {
      const error = expectErr(parseExitCondition('0'), 'parsing 0');
      expect(error._tag).toBe('ExitConditionSyntax');
      expect(error.column).toBe(1);
      expect(error.message).toBe(
        "exit condition parsing error '0'@1: exit condition must define an expected count different from zero"
      );
    });

    it('rejects a count missing after the dash', () => {
      const error = expectErr(parseExitCondition('-:x'), 'parsing -:x');
      expect(error.column).toBe(1);
      expect(error.reason).toBe('exit condition must define an expected count different from zero');
    });

    it('rejects an empty condition', () => {
      expect(expectErr(parseExitCondition(''), 'parsing empty').column).toBe(1);
    });

    it('rejects a non-digit at the start', () => {
      const error = expectErr(parseExitCondition('x3'), 'parsing x3');
      expect(error.column).toBe(1);
      expect(error.character).toBe('x');
      expect(error.reason).toBe("unexpected character 'x' at start");
    });

    it('rejects a letter other than s before the colon', () => {
      const error = expectErr(parseExitCondition('3z'), 'parsing 3z');
      expect(error.column).toBe(2);
      expect(error.reason).toBe("expect ':', got 'z'");
    });

    it('rejects a repeated location flag', () => {
      const error = expectErr(parseExitCondition('3ss'), 'parsing 3ss');
      expect(error.column).toBe(3);
      expect(error.reason).toBe("repeat loc flag 's'");
    });

    it('rejects a count beyond the safe integer range', () => {
      const error = expectErr(parseExitCondition('9999999999999999'), 'parsing huge count');
      expect(error.column).toBe(16);
      expect(error.reason).toBe('expected count is too large');
    });
  });

  describe('report options', () => {
    it('shows the failure count for n when counting successes', () => {
      const { report } = expectOk(parseExitCondition('3:n'), 'parsing 3:n');
      expect(report.showFailureCount).toBe(true);
      expect(report.showSuccessCount).toBe(false);
    });

    it('shows the success count for n when counting failures', () => {
      const { report } = expectOk(parseExitCondition('-3:n'), 'parsing -3:n');
      expect(report.showSuccessCount).toBe(true);
      expect(report.showFailureCount).toBe(false);
    });

    it('honours +n and -n modifiers regardless of counting mode', () => {
      const plus = expectOk(parseExitCondition('-3:+n'), 'parsing -3:+n').report;
      expect([plus.showSuccessCount, plus.showFailureCount]).toEqual([true, false]);

      const minus = expectOk(parseExitCondition('3:-n'), 'parsing 3:-n').report;
      expect([minus.showSuccessCount, minus.showFailureCount]).toEqual([false, true]);
    });

    it('shows both counts for N', () => {
      const { report } = expectOk(parseExitCondition('-5s:xN'), 'parsing -5s:xN');
      expect(report).toMatchObject({ exitStatus: true, showSuccessCount: true, showFailureCount: true });
    });

    it('sets silent and state flags for q and c', () => {
      const { report } = expectOk(parseExitCondition('3:qc'), 'parsing 3:qc');
      expect(report.silent).toBe(true);
      expect(report.showState).toBe(true);
    });

    it('uses the default map for a bare m', () => {
      const { report } = expectOk(parseExitCondition('3:m'), 'parsing 3:m');
      expect(report.map).toEqual({ maxCapacity: 100, glyphs: { success: '+', failure: '-' } });
    });

    it('takes the default map capacity from options', () => {
      const { report } = expectOk(parseExitCondition('3:m', { defaultMapCapacity: 20 }), 'parsing 3:m');
      expect(report.map?.maxCapacity).toBe(20);
    });

    it('reads map size and glyphs, success glyph first', () => {
      const { report } = expectOk(parseExitCondition('10:m(200:.x)'), 'parsing 10:m(200:.x)');
      expect(report.map).toEqual({ maxCapacity: 200, glyphs: { success: '.', failure: 'x' } });
    });

    it('reads glyphs without a size', () => {
      const { report } = expectOk(parseExitCondition('5s:xNm(:^_)'), 'parsing 5s:xNm(:^_)');
      expect(report.map).toEqual({ maxCapacity: 100, glyphs: { success: '^', failure: '_' } });
    });

    it('reads a size without glyphs', () => {
      const { report } = expectOk(parseExitCondition('3:m(5)'), 'parsing 3:m(5)');
      expect(report.map).toEqual({ maxCapacity: 5, glyphs: { success: '+', failure: '-' } });
    });

    it('resets the map capacity on a repeated m', () => {
      const { report } = expectOk(parseExitCondition('3:m(7)m'), 'parsing 3:m(7)m');
      expect(report.map?.maxCapacity).toBe(100);
    });

    it('accepts options in any order', () => {
      const { report } = expectOk(parseExitCondition('2:m(3)cxq+n'), 'parsing 2:m(3)cxq+n');
      expect(report).toEqual({
        exitStatus: true,
        showSuccessCount: true,
        showFailureCount: false,
        showState: true,
        silent: true,
        map: { maxCapacity: 3, glyphs: { success: '+', failure: '-' } },
      });
    });
  });

  describe('option errors', () => {
    it('rejects an unknown option', () => {
      const error = expectErr(parseExitCondition('3:z'), 'parsing 3:z');
      expect(error.column).toBe(3);
      expect(error.reason).toBe("invalid option 'z'");
    });

    it('rejects a modifier on an option other than n', () => {
      const error = expectErr(parseExitCondition('3:+x'), 'parsing 3:+x');
      expect(error.column).toBe(4);
      expect(error.reason).toBe("+/- modifiers only allowed for 'n' option");
    });

    it('rejects a modifier at the end of the text', () => {
      const error = expectErr(parseExitCondition('3:+'), 'parsing 3:+');
      expect(error.column).toBe(4);
      expect(error.character).toBeUndefined();
      expect(error.reason).toBe('unexpected end of option string');
    });

    it('rejects an unterminated argument list', () => {
      const error = expectErr(parseExitCondition('3:m(5:ab'), 'parsing 3:m(5:ab');
      expect(error.column).toBe(9);
      expect(error.reason).toBe("unexpected end-of-string looking for ')'");
      expect(error.message).toBe("exit condition parsing error '3:m(5:ab'@9: unexpected end-of-string looking for ')'");
    });

    it('rejects arguments on options other than m', () => {
      const error = expectErr(parseExitCondition('3:x(1)'), 'parsing 3:x(1)');
      expect(error.column).toBe(5);
      expect(error.reason).toBe("option 'x' does not expect arguments");
    });

    it('rejects an empty map argument list', () => {
      const error = expectErr(parseExitCondition('3:m()'), 'parsing 3:m()');
      expect(error.column).toBe(5);
      expect(error.reason).toBe("empty argument list for option 'm'");
    });

    it('rejects a zero map size', () => {
      const error = expectErr(parseExitCondition('3:m(0)'), 'parsing 3:m(0)');
      expect(error.column).toBe(6);
      expect(error.reason).toBe("'m' arg map size must be >0");
    });

    it('rejects a non-digit in the map size', () => {
      const error = expectErr(parseExitCondition('3:m(1a)'), 'parsing 3:m(1a)');
      expect(error.column).toBe(6);
      expect(error.reason).toBe("invalid character (a) in args to option 'm', expecting digit or ':'");
    });

    it('rejects anything but two glyphs after the colon', () => {
      const one = expectErr(parseExitCondition('3:m(5:a)'), 'parsing 3:m(5:a)');
      expect(one.column).toBe(7);
      expect(one.reason).toBe("expecting exactly 2 characters after ':' in 'm' args");

      const three = expectErr(parseExitCondition('3:m(:abc)'), 'parsing 3:m(:abc)');
      expect(three.column).toBe(6);

      const none = expectErr(parseExitCondition('3:m(5:)'), 'parsing 3:m(5:)');
      expect(none.column).toBe(7);
    });
  });
});
