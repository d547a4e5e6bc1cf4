import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { INTERPRETATION_ERROR_CODES } from './interpreter_errors';
import { OPERATORS, PRECEDENCE_TIERS, operate } from './operators';
import { OperatorSymbol } from '../tokenizer/tokens';
import { defaultContext } from '../context';

const decimal = (value: string) => new defaultContext.Decimal(value);

function run(left: string, operator: OperatorSymbol, right: string) {
  return pipe(
    operate(decimal(left), operator, decimal(right)),
    E.map((value) => value.toString())
  );
}

describe('operators', () => {
  test('ranks ^ above * and /, and those above + and -', () => {
    expect(PRECEDENCE_TIERS).toEqual([3, 2, 1]);
    expect(OPERATORS['^'].tier).toBe(3);
    expect(OPERATORS['*'].tier).toBe(2);
    expect(OPERATORS['/'].tier).toBe(2);
    expect(OPERATORS['+'].tier).toBe(1);
    expect(OPERATORS['-'].tier).toBe(1);
  });

  test('applies each operator to its operands', () => {
    expect(run('7', '+', '2.5')).toEqual(E.right('9.5'));
    expect(run('7', '-', '2.5')).toEqual(E.right('4.5'));
    expect(run('7', '*', '2.5')).toEqual(E.right('17.5'));
    expect(run('7', '/', '2.5')).toEqual(E.right('2.8'));
    expect(run('2', '^', '10')).toEqual(E.right('1024'));
  });

  test('divides rather than multiplies', () => {
    expect(run('8', '/', '4')).toEqual(E.right('2'));
  });

  test('rejects a zero divisor', () => {
    const divisionByZero = E.left({
      reason: INTERPRETATION_ERROR_CODES.division_by_zero,
    });

    expect(run('1', '/', '0')).toEqual(divisionByZero);
    expect(run('0', '/', '0.000')).toEqual(divisionByZero);
  });

  test('rejects results that are not finite', () => {
    expect(run('0', '^', '-1')).toEqual(
      E.left({
        reason: INTERPRETATION_ERROR_CODES.non_finite_result,
        operator: '^',
      })
    );
    expect(run('-8', '^', '0.5')).toEqual(
      E.left({
        reason: INTERPRETATION_ERROR_CODES.non_finite_result,
        operator: '^',
      })
    );
  });
});
