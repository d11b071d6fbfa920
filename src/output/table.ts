/**
 * Table output format for terminals.
 */

import chalk from 'chalk';
import { STRATEGIES } from '../game/types';
import { DEFAULT_PRECISION, type SummaryRow, type SummaryTable } from '../simulation/summary';

export interface TableOptions {
  precision?: number;
  /** Highlight the winning strategy */
  color?: boolean;
}

const HEADERS = ['strategy', 'WIN', 'LOSE', 'games', 'win rate CI'] as const;

function formatRow(row: SummaryRow, precision: number): string[] {
  const { lower, upper } = row.confidenceInterval;
  return [
    row.strategy,
    row.WIN.toFixed(precision),
    row.LOSE.toFixed(precision),
    String(row.games),
    `${lower.toFixed(precision)} - ${upper.toFixed(precision)}`,
  ];
}

/**
 * Render a summary as aligned columns, one row per strategy
 */
export function formatSummaryTable(summary: SummaryTable, options: TableOptions = {}): string {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const rows = STRATEGIES.map((strategy) => formatRow(summary[strategy], precision));
  const widths = HEADERS.map((header, i) =>
    Math.max(header.length, ...rows.map((cells) => cells[i].length)),
  );

  const best = summary.switch.winRate >= summary.stay.winRate ? 'switch' : 'stay';
  const lines: string[] = [];

  lines.push(HEADERS.map((header, i) => header.padEnd(widths[i])).join('  ').trimEnd());
  lines.push(widths.map((w) => '─'.repeat(w)).join('──'));

  rows.forEach((cells, r) => {
    const line = cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();
    lines.push(options.color && STRATEGIES[r] === best ? chalk.green(line) : line);
  });

  const level = Math.round(summary.stay.confidenceInterval.level * 100);
  lines.push('');
  lines.push(options.color ? chalk.dim(`CI: ${level}% Wilson interval`) : `CI: ${level}% Wilson interval`);

  return lines.join('\n') + '\n';
}
