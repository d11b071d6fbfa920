/**
 * Output formats for summaries: table or JSON.
 */

import type { SummaryTable } from '../simulation/summary';
import { formatJson } from './json';
import { formatSummaryTable, type TableOptions } from './table';

export type OutputFormat = 'table' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json';
}

export function formatOutput(
  summary: SummaryTable,
  format: OutputFormat,
  options: TableOptions = {},
): string {
  switch (format) {
    case 'json':
      return formatJson(summary);
    case 'table':
    default:
      return formatSummaryTable(summary, options);
  }
}

/**
 * Print a summary. Batch runs never print on their own; callers opt in here.
 */
export function printSummary(
  summary: SummaryTable,
  format: OutputFormat = 'table',
  options: TableOptions = {},
  write: (text: string) => void = (text) => {
    process.stdout.write(text);
  },
): void {
  write(formatOutput(summary, format, options));
}

export { formatSummaryTable, type TableOptions } from './table';
export { formatJson } from './json';
