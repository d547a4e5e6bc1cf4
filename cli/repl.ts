import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { createInterface } from 'node:readline';
import { evaluate } from '../core/calculator';
import { CalculatorContext } from '../core/context';
import { formatError, formatResult } from '../core/format';

export type ReplOptions = {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  readonly prompt: string;
  readonly context: CalculatorContext;
};

export function describeEvaluation(
  line: string,
  context: CalculatorContext
): string {
  return pipe(
    evaluate(line, context),
    E.match(
      (error) => `Error: ${formatError(error)}`,
      (value) => `Evaluation: ${formatResult(value)}`
    )
  );
}

/**
 * Prompts for one expression per line until `input` ends. Blank lines are
 * skipped.
 */
export async function runRepl({
  input,
  output,
  prompt,
  context,
}: ReplOptions): Promise<void> {
  const lines = createInterface({ input, terminal: false });
  output.write(prompt);

  for await (const line of lines) {
    if (line.trim()) {
      output.write(`${describeEvaluation(line, context)}\n`);
    }
    output.write(prompt);
  }
}
