import { describe, it, expect } from 'vitest';
import { parseExitCondition } from '../../src/exit-condition/parser.js';
import { ExitConditionTracker } from '../../src/exit-condition/tracker.js';
import { formatReport, hasReportFields } from '../../src/exit-condition/report.js';
import { expectOk } from '../helpers/result-helpers.js';

/** Tracker after replaying a `+`/`-` pattern. */
function runPattern(condition: string, pattern: string): ExitConditionTracker {
  const tracker = new ExitConditionTracker(expectOk(parseExitCondition(condition), `parsing ${condition}`));
  let transmitted = 0;
  let received = 0;
  for (const c of pattern) {
    transmitted++;
    if (c === '+') received++;
    expectOk(tracker.update({ transmitted, received }), `probe ${transmitted}`);
  }
  return tracker;
}

describe('formatReport', () => {
  it('prints both counts after the label', () => {
    expect(formatReport(runPattern('2:xN', '+-+').snapshot())).toBe('exit-cond:2/1\n');
  });

  it('omits the label when silent', () => {
    expect(formatReport(runPattern('2:qN', '+-+').snapshot())).toBe('2/1\n');
  });

  it('orders state, counts and map', () => {
    expect(formatReport(runPattern('2:cNm', '+-+').snapshot())).toBe('exit-cond:T/2/1/+-+\n');
  });

  it('prints F while the condition is unmet', () => {
    expect(formatReport(runPattern('5:c', '+').snapshot())).toBe('exit-cond:F\n');
  });

  it('prints the complementary count for n', () => {
    expect(formatReport(runPattern('3:n', '+-').snapshot())).toBe('exit-cond:1\n');
    expect(formatReport(runPattern('-3:n', '+-+').snapshot())).toBe('exit-cond:2\n');
  });

  it('prints only the map without separators around absent fields', () => {
    expect(formatReport(runPattern('9:m(:^_)', '++-').snapshot())).toBe('exit-cond:^^_\n');
  });

  it('uses a custom label', () => {
    expect(formatReport(runPattern('2:N', '+-').snapshot(), { label: 'ping' })).toBe('ping:1/1\n');
  });

  it('is empty when nothing was requested', () => {
    expect(formatReport(runPattern('3:x', '+').snapshot())).toBe('');
  });

  it('prints the bare label when forced', () => {
    expect(formatReport(runPattern('3', '+').snapshot(), { force: true })).toBe('exit-cond:\n');
    expect(formatReport(runPattern('3:q', '+').snapshot(), { force: true })).toBe('\n');
  });
});

describe('hasReportFields', () => {
  it('is true only for state, count and map options', () => {
    const has = (condition: string) => hasReportFields(expectOk(parseExitCondition(condition), condition));

    expect(has('3')).toBe(false);
    expect(has('3:xq')).toBe(false);
    expect(has('3:c')).toBe(true);
    expect(has('3:n')).toBe(true);
    expect(has('3:m')).toBe(true);
  });
});
