#!/usr/bin/env node
import { Command } from 'commander';
import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { evaluate } from '../core/calculator';
import { DEFAULT_PRECISION, createContext } from '../core/context';
import { formatError, formatResult } from '../core/format';
import { parsePrecision } from './options';
import { runRepl } from './repl';

type CliOptions = {
  expression?: string;
  precision: string;
  prompt: string;
};

const program = new Command();

program
  .name('calc')
  .description('Evaluate arithmetic expressions with decimal precision')
  .option('-e, --expression <text>', 'Evaluate one expression and exit')
  .option(
    '-p, --precision <digits>',
    'Significant digits for division and powers',
    String(DEFAULT_PRECISION)
  )
  .option('--prompt <text>', 'Prompt for interactive mode', 'Enter a formula: ')
  .action(async () => {
    const options = program.opts<CliOptions>();
    const precision = parsePrecision(options.precision);

    if (E.isLeft(precision)) {
      console.error(precision.left);
      process.exitCode = 1;
      return;
    }

    const context = createContext({ precision: precision.right });

    if (options.expression === undefined) {
      await runRepl({
        input: process.stdin,
        output: process.stdout,
        prompt: options.prompt,
        context,
      });
      return;
    }

    pipe(
      evaluate(options.expression, context),
      E.match(
        (error) => {
          console.error(`Error: ${formatError(error)}`);
          process.exitCode = 1;
        },
        (value) => {
          console.log(formatResult(value));
        }
      )
    );
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
