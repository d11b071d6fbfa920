/**
 * monty-hall play: run a batch and print the strategy summary.
 */

import type { Command } from 'commander';
import { SimulationError, ErrorCode } from '../../core/errors';
import { MontyHallSimulator, DEFAULT_GAMES } from '../../simulation/BatchRunner';
import { DEFAULT_PRECISION } from '../../simulation/summary';
import { formatOutput, isOutputFormat, OUTPUT_FORMATS } from '../../output';

export interface PlayOptions {
  games: string;
  seed?: string;
  precision: string;
  format: string;
  shards?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  color: boolean;
}

const INTEGER = /^-?\d+$/;

function parseInteger(raw: string, name: string): number {
  if (!INTEGER.test(raw.trim())) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, `Invalid ${name} '${raw}': expected an integer`);
  }
  return Number(raw);
}

/**
 * Run the play command; returns the process exit code
 */
export function runPlay(opts: PlayOptions, io: CommandIO): number {
  if (!isOutputFormat(opts.format)) {
    io.stderr(`Invalid format '${opts.format}'. Valid: ${OUTPUT_FORMATS.join(', ')}\n`);
    return 2;
  }

  try {
    const games = parseInteger(opts.games, 'game count');
    const precision = parseInteger(opts.precision, 'precision');
    const rawSeed = opts.seed ?? io.env.MONTY_HALL_SEED;
    const seed = rawSeed !== undefined ? parseInteger(rawSeed, 'seed') : undefined;

    // Seed line on stderr; stdout carries only the summary
    const simulator = new MontyHallSimulator({
      seed,
      precision,
      verbose: opts.verbose === true && opts.quiet !== true,
      log: (message) => io.stderr(`${message}\n`),
    });
    const run =
      opts.shards !== undefined
        ? simulator.runSharded(games, parseInteger(opts.shards, 'shard count'))
        : simulator.run(games);

    if (!opts.quiet) {
      io.stdout(formatOutput(run.summary, opts.format, { precision, color: io.color }));
    }
    return 0;
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 2;
  }
}

export function registerPlayCommand(program: Command, io: CommandIO): void {
  program
    .command('play')
    .description('Play the Monty Hall game repeatedly and compare staying with switching')
    .option('-n, --games <n>', 'Number of rounds to play', String(DEFAULT_GAMES))
    .option('-s, --seed <seed>', 'Seed for reproducible runs (default: $MONTY_HALL_SEED or random)')
    .option('-p, --precision <digits>', 'Decimal places in the summary', String(DEFAULT_PRECISION))
    .option('-f, --format <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'table')
    .option('--shards <count>', 'Split the run over independent random streams')
    .option('-q, --quiet', 'Suppress all output except errors')
    .option('-v, --verbose', 'Log the seed used')
    .action((opts: PlayOptions) => {
      process.exitCode = runPlay(opts, io);
    });
}
