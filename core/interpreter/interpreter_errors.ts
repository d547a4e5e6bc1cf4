import { OperatorSymbol } from '../tokenizer/tokens';

export type InterpretationError =
  | {
      reason: 'malformed_expression';
      expected: 'operand' | 'operator';
    }
  | {
      reason: 'division_by_zero';
    }
  | {
      reason: 'non_finite_result';
      operator: OperatorSymbol;
    };

export const INTERPRETATION_ERROR_CODES = {
  division_by_zero: 'division_by_zero',
  malformed_expression: 'malformed_expression',
  non_finite_result: 'non_finite_result',
} as const;
