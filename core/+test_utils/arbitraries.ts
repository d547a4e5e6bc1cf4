import * as fc from 'fast-check';

export const digitArbitrary = fc.constantFrom(...'0123456789');
export const characterArbitrary = fc.constantFrom(
  ...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ_$%=,;!'
);
export const whitespaceArbitrary = fc
  .array(fc.constantFrom(' ', '\t'), { minLength: 0, maxLength: 3 })
  .map((whitespace) => whitespace.join(''));
export const numberStringArbitrary = fc
  .tuple(
    fc.array(digitArbitrary, { minLength: 0, maxLength: 4 }),
    fc.option(fc.array(digitArbitrary, { minLength: 1, maxLength: 4 }))
  )
  .map(([integer, decimal]) => {
    if (!integer.length && !decimal) {
      return '0';
    }

    return `${integer.join('')}${decimal ? `.${decimal.join('')}` : ''}`;
  });
export const operatorArbitrary = fc.constantFrom(
  '+' as const,
  '-' as const,
  '*' as const,
  '/' as const,
  '^' as const
);

/** Well-formed expressions: every operator sits between two operands. */
export const expressionArbitrary: fc.Arbitrary<string> = fc.letrec<{
  expression: string;
  operand: string;
}>((tie) => ({
  expression: fc.oneof(
    { depthSize: 'small', withCrossShrink: true },
    tie('operand'),
    fc
      .tuple(tie('operand'), operatorArbitrary, tie('expression'))
      .map(([left, operator, right]) => `${left}${operator}${right}`)
  ),
  operand: fc.oneof(
    { depthSize: 'small', withCrossShrink: true },
    numberStringArbitrary,
    tie('expression').map((expression) => `(${expression})`)
  ),
})).expression;
