import { Decimal } from 'decimal.js';

export const DEFAULT_PRECISION = 28;

export type CalculatorOptions = {
  readonly precision?: number;
  readonly rounding?: Decimal.Rounding;
};

export type CalculatorContext = {
  readonly Decimal: Decimal.Constructor;
};

/**
 * Creates an evaluation context whose numbers are decimals rounded to
 * `precision` significant digits on division and power.
 */
export function createContext({
  precision = DEFAULT_PRECISION,
  rounding,
}: CalculatorOptions = {}): CalculatorContext {
  return {
    Decimal: Decimal.clone({ precision, rounding }),
  };
}

export const defaultContext: CalculatorContext = createContext();
