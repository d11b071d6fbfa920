/**
 * Aggregation of batch results into per-strategy win/lose proportions
 */

import jStat from 'jstat';
import { SimulationError, ErrorCode } from '../core/errors';
import { STRATEGIES, type RoundOutcome, type Strategy } from '../game/types';

export const DEFAULT_PRECISION = 2;
export const DEFAULT_CONFIDENCE = 0.95;

export interface ConfidenceInterval {
  level: number;
  lower: number;
  upper: number;
}

export interface SummaryRow {
  strategy: Strategy;
  games: number;
  wins: number;
  losses: number;
  /** Unrounded win proportion */
  winRate: number;
  /** Rounded proportions; WIN + LOSE === 1 */
  WIN: number;
  LOSE: number;
  /** Wilson score interval for the win rate */
  confidenceInterval: ConfidenceInterval;
}

export type SummaryTable = Record<Strategy, SummaryRow>;

export interface SummaryOptions {
  precision?: number;
  confidenceLevel?: number;
}

/**
 * Rounds played with each strategy winning alone, both or neither.
 * Every valid round has exactly one winning strategy.
 */
export interface PairedComparison {
  rounds: number;
  stayOnly: number;
  switchOnly: number;
  both: number;
  neither: number;
}

export function round(value: number, digits: number = DEFAULT_PRECISION): number {
  const p = Math.pow(10, digits);
  return Math.round(value * p) / p;
}

export function wilsonInterval(wins: number, games: number, level: number): ConfidenceInterval {
  const z = jStat.normal.inv(1 - (1 - level) / 2, 0, 1);
  const p = wins / games;
  const z2 = z * z;
  const denominator = 1 + z2 / games;
  const center = (p + z2 / (2 * games)) / denominator;
  const halfWidth = (z * Math.sqrt((p * (1 - p)) / games + z2 / (4 * games * games))) / denominator;

  return {
    level,
    lower: Math.max(0, center - halfWidth),
    upper: Math.min(1, center + halfWidth),
  };
}

export function validateSummaryOptions(precision: number, confidenceLevel: number): void {
  if (!Number.isInteger(precision) || precision < 0 || precision > 10) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Precision must be an integer from 0 to 10', {
      precision,
    });
  }
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Confidence level must be between 0 and 1', {
      confidenceLevel,
    });
  }
}

/**
 * Row proportions of WIN and LOSE for each strategy.
 *
 * LOSE is taken as 1 - WIN after rounding so each row sums to exactly 1.
 */
export function summarize(results: readonly RoundOutcome[], options: SummaryOptions = {}): SummaryTable {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const confidenceLevel = options.confidenceLevel ?? DEFAULT_CONFIDENCE;
  validateSummaryOptions(precision, confidenceLevel);

  const counts: Record<Strategy, { wins: number; losses: number }> = {
    stay: { wins: 0, losses: 0 },
    switch: { wins: 0, losses: 0 },
  };
  for (const { strategy, outcome } of results) {
    if (outcome === 'WIN') {
      counts[strategy].wins++;
    } else {
      counts[strategy].losses++;
    }
  }

  const buildRow = (strategy: Strategy): SummaryRow => {
    const { wins, losses } = counts[strategy];
    const games = wins + losses;
    if (games === 0) {
      throw new SimulationError(ErrorCode.INVALID_INPUT, `No results for strategy '${strategy}'`, {
        strategy,
        rows: results.length,
      });
    }
    const winRate = wins / games;
    const WIN = round(winRate, precision);
    return {
      strategy,
      games,
      wins,
      losses,
      winRate,
      WIN,
      LOSE: round(1 - WIN, precision),
      confidenceInterval: wilsonInterval(wins, games, confidenceLevel),
    };
  };

  return {
    stay: buildRow(STRATEGIES[0]),
    switch: buildRow(STRATEGIES[1]),
  };
}

/**
 * Compare the two strategies round by round.
 * Expects rows in the order playNGames produces: stay then switch per round.
 */
export function pairedComparison(results: readonly RoundOutcome[]): PairedComparison {
  if (results.length % 2 !== 0) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Results must hold a stay and a switch row per round', {
      rows: results.length,
    });
  }

  const comparison: PairedComparison = { rounds: 0, stayOnly: 0, switchOnly: 0, both: 0, neither: 0 };
  for (let i = 0; i < results.length; i += 2) {
    const stay = results[i];
    const change = results[i + 1];
    if (stay.strategy !== 'stay' || change.strategy !== 'switch') {
      throw new SimulationError(ErrorCode.INVALID_INPUT, 'Rows are not paired as stay then switch', {
        row: i,
        strategies: [stay.strategy, change.strategy],
      });
    }

    const stayWon = stay.outcome === 'WIN';
    const switchWon = change.outcome === 'WIN';
    comparison.rounds++;
    if (stayWon && switchWon) comparison.both++;
    else if (stayWon) comparison.stayOnly++;
    else if (switchWon) comparison.switchOnly++;
    else comparison.neither++;
  }
  return comparison;
}
