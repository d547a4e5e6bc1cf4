import { Decimal } from 'decimal.js';

export type OperatorSymbol = '+' | '-' | '*' | '/' | '^';

export type NumberToken = {
  type: 'number';
  value: Decimal;
};

export type OperatorToken<TOperator extends OperatorSymbol = OperatorSymbol> =
  TOperator extends OperatorSymbol
    ? {
        type: 'operator';
        value: TOperator;
      }
    : never;

export type GroupToken = {
  type: 'group';
  children: ReadonlyArray<Token>;
};

export type Token = NumberToken | OperatorToken | GroupToken;
