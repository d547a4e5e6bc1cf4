import { Decimal } from 'decimal.js';
import { CalculatorError } from './calculator';

/** Largest exponent magnitude printed in plain notation. */
export const MAX_PLAIN_EXPONENT = 100;

/**
 * Plain decimal notation, switching to exponential notation for values whose
 * exponent is beyond `MAX_PLAIN_EXPONENT` either way.
 */
export function formatResult(value: Decimal): string {
  if (value.isZero()) {
    return '0';
  }

  return Math.abs(value.e) > MAX_PLAIN_EXPONENT
    ? value.toExponential()
    : value.toFixed();
}

export function formatError(error: CalculatorError): string {
  switch (error.reason) {
    case 'unexpected_character':
      return `Unexpected character '${error.character}' at column ${
        error.position + 1
      }`;
    case 'invalid_number':
      return `Invalid number '${error.literal}' at column ${
        error.position + 1
      }`;
    case 'unbalanced_parentheses':
      return `Unbalanced parenthesis at column ${error.position + 1}`;
    case 'malformed_expression':
      return `Malformed expression: expected an ${error.expected}`;
    case 'division_by_zero':
      return 'Division by zero';
    case 'non_finite_result':
      return `Result of '${error.operator}' is not a finite number`;
  }
}
