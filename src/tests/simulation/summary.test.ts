import { describe, it, expect } from 'vitest';
import { summarize, pairedComparison, wilsonInterval, round } from '../../simulation/summary';
import type { RoundOutcome } from '../../game/types';
import { ErrorCode } from '../../core/errors';
import { expectSimulationError } from '../utilities/assertions';

const rows = (...pairs: Array<[RoundOutcome['outcome'], RoundOutcome['outcome']]>): RoundOutcome[] =>
  pairs.flatMap(([stay, change]) => [
    { strategy: 'stay' as const, outcome: stay },
    { strategy: 'switch' as const, outcome: change },
  ]);

describe('summarize', () => {
  const results = rows(['WIN', 'LOSE'], ['LOSE', 'WIN'], ['LOSE', 'WIN']);

  it('should count wins and losses per strategy', () => {
    const summary = summarize(results);

    expect(summary.stay).toMatchObject({ strategy: 'stay', games: 3, wins: 1, losses: 2 });
    expect(summary.switch).toMatchObject({ strategy: 'switch', games: 3, wins: 2, losses: 1 });
    expect(summary.stay.winRate).toBeCloseTo(1 / 3, 10);
  });

  it('should round proportions to two places by default', () => {
    const summary = summarize(results);

    expect(summary.stay.WIN).toBe(0.33);
    expect(summary.stay.LOSE).toBe(0.67);
    expect(summary.switch.WIN).toBe(0.67);
    expect(summary.switch.LOSE).toBe(0.33);
  });

  it('should make each row sum to one', () => {
    const summary = summarize(results, { precision: 1 });

    expect(summary.stay.WIN).toBe(0.3);
    expect(summary.stay.LOSE).toBe(0.7);
    expect(summary.stay.WIN + summary.stay.LOSE).toBeCloseTo(1, 10);
  });

  it('should attach a confidence interval around the win rate', () => {
    const { confidenceInterval, winRate } = summarize(results, { confidenceLevel: 0.9 }).switch;

    expect(confidenceInterval.level).toBe(0.9);
    expect(confidenceInterval.lower).toBeLessThan(winRate);
    expect(confidenceInterval.upper).toBeGreaterThan(winRate);
  });

  it('should reject results missing a strategy', () => {
    const onlyStay: RoundOutcome[] = [{ strategy: 'stay', outcome: 'WIN' }];
    const error = expectSimulationError(() => summarize(onlyStay), ErrorCode.INVALID_INPUT);
    expect(error.context).toEqual({ strategy: 'switch', rows: 1 });

    expectSimulationError(() => summarize([]), ErrorCode.INVALID_INPUT);
  });

  it('should reject bad precision or confidence level', () => {
    expectSimulationError(() => summarize(results, { precision: 1.5 }), ErrorCode.INVALID_INPUT);
    expectSimulationError(() => summarize(results, { precision: -1 }), ErrorCode.INVALID_INPUT);
    expectSimulationError(() => summarize(results, { confidenceLevel: 1 }), ErrorCode.INVALID_INPUT);
    expectSimulationError(() => summarize(results, { confidenceLevel: 0 }), ErrorCode.INVALID_INPUT);
  });
});

describe('wilsonInterval', () => {
  it('should match the known interval for 5 of 10', () => {
    const ci = wilsonInterval(5, 10, 0.95);
    expect(ci.lower).toBeCloseTo(0.2366, 3);
    expect(ci.upper).toBeCloseTo(0.7634, 3);
  });

  it('should stay inside [0, 1] at the extremes', () => {
    const none = wilsonInterval(0, 10, 0.95);
    expect(none.lower).toBeCloseTo(0, 10);
    expect(none.upper).toBeCloseTo(0.2775, 3);

    const all = wilsonInterval(10, 10, 0.95);
    expect(all.lower).toBeCloseTo(0.7225, 3);
    expect(all.upper).toBeCloseTo(1, 10);
  });
});

describe('round', () => {
  it('should round to the requested digits', () => {
    expect(round(0.6666)).toBe(0.67);
    expect(round(0.6666, 3)).toBe(0.667);
    expect(round(0.5, 0)).toBe(1);
  });
});

describe('pairedComparison', () => {
  it('should count which strategy won each round', () => {
    const comparison = pairedComparison(rows(['WIN', 'LOSE'], ['LOSE', 'WIN'], ['LOSE', 'WIN']));
    expect(comparison).toEqual({ rounds: 3, stayOnly: 1, switchOnly: 2, both: 0, neither: 0 });
  });

  it('should report rounds where both or neither won', () => {
    const comparison = pairedComparison(rows(['WIN', 'WIN'], ['LOSE', 'LOSE']));
    expect(comparison).toEqual({ rounds: 2, stayOnly: 0, switchOnly: 0, both: 1, neither: 1 });
  });

  it('should reject unpaired rows', () => {
    expectSimulationError(
      () => pairedComparison([{ strategy: 'stay', outcome: 'WIN' }]),
      ErrorCode.INVALID_INPUT
    );
    const error = expectSimulationError(
      () =>
        pairedComparison([
          { strategy: 'switch', outcome: 'WIN' },
          { strategy: 'stay', outcome: 'LOSE' },
        ]),
      ErrorCode.INVALID_INPUT
    );
    expect(error.context).toEqual({ row: 0, strategies: ['switch', 'stay'] });
  });
});
