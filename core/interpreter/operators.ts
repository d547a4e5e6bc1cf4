import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { Decimal } from 'decimal.js';
import { OperatorSymbol } from '../tokenizer/tokens';
import { InterpretationError } from './interpreter_errors';

export type PrecedenceTier = 1 | 2 | 3;

export type OperationResult = E.Either<InterpretationError, Decimal>;

type OperatorDefinition = Readonly<{
  tier: PrecedenceTier;
  apply(left: Decimal, right: Decimal): OperationResult;
}>;

/** Highest precedence first. */
export const PRECEDENCE_TIERS: ReadonlyArray<PrecedenceTier> = [3, 2, 1];

export const OPERATORS: Readonly<Record<OperatorSymbol, OperatorDefinition>> =
  {
    '^': {
      tier: 3,
      apply: (left, right) => E.right(left.pow(right)),
    },
    '*': {
      tier: 2,
      apply: (left, right) => E.right(left.times(right)),
    },
    '/': {
      tier: 2,
      apply: (left, right) =>
        right.isZero()
          ? E.left({ reason: 'division_by_zero' })
          : E.right(left.div(right)),
    },
    '+': {
      tier: 1,
      apply: (left, right) => E.right(left.plus(right)),
    },
    '-': {
      tier: 1,
      apply: (left, right) => E.right(left.minus(right)),
    },
  };

/**
 * Applies `operator` to its operands. Values are computed with the precision
 * and rounding of the operands' decimal constructor.
 */
export function operate(
  left: Decimal,
  operator: OperatorSymbol,
  right: Decimal
): OperationResult {
  return pipe(
    OPERATORS[operator].apply(left, right),
    E.flatMap(
      (value): OperationResult =>
        value.isFinite()
          ? E.right(value)
          : E.left({ reason: 'non_finite_result', operator })
    )
  );
}
