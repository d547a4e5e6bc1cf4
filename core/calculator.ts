import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { Decimal } from 'decimal.js';
import { CalculatorContext, defaultContext } from './context';
import { interpret } from './interpreter/interpret';
import { InterpretationError } from './interpreter/interpreter_errors';
import { tokenize } from './tokenizer/tokenizer';
import { TokenizationError } from './tokenizer/tokenizer_errors';

export type CalculatorError = TokenizationError | InterpretationError;

export type CalculationResult = E.Either<CalculatorError, Decimal>;

/**
 * Evaluates a single-line arithmetic expression such as `2*(4+3)`.
 *
 * Supports decimal literals, `+ - * / ^` and parentheses. `^` binds tighter
 * than `* /`, which bind tighter than `+ -`; operators of equal precedence
 * are applied left to right. Whitespace is ignored.
 */
export function evaluate(
  input: string,
  context: CalculatorContext = defaultContext
): CalculationResult {
  return pipe(
    tokenize(input, context),
    E.flatMap((tokens) => interpret(tokens, context))
  );
}
