import { Command } from 'commander';
import { VERSION } from '../index';
import { registerPlayCommand, type CommandIO } from './commands/play';

export function createProgram(io: CommandIO): Command {
  const program = new Command();
  program
    .name('monty-hall')
    .description('Simulate the Monty Hall problem')
    .version(VERSION);
  registerPlayCommand(program, io);
  return program;
}
