import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import fc from 'fast-check';
import { tokenize } from './tokenizer';
import { Token } from './tokens';
import {
  TOKENIZATION_ERROR_CODES,
  TokenizationError,
} from './tokenizer_errors';
import { defaultContext } from '../context';
import {
  characterArbitrary,
  numberStringArbitrary,
  operatorArbitrary,
  whitespaceArbitrary,
} from '../+test_utils/arbitraries';

type TokenShape = string | ReadonlyArray<TokenShape>;

describe('tokenize', () => {
  test('should tokenize arbitrary number strings correctly', () => {
    fc.assert(
      fc.property(numberStringArbitrary, (numberString) => {
        expectResultsToBe(tokenize(numberString), 'ok', [
          new defaultContext.Decimal(numberString).toString(),
        ]);
      })
    );
  });

  test('should tokenize operator correctly', () => {
    fc.assert(
      fc.property(operatorArbitrary, (operator) => {
        expectResultsToBe(tokenize(operator), 'ok', [operator]);
      })
    );
  });

  test('tokenizes [number] {operator} [number] ignoring whitespace', () => {
    fc.assert(
      fc.property(
        fc.tuple(
          numberStringArbitrary,
          operatorArbitrary,
          numberStringArbitrary,
          whitespaceArbitrary,
          whitespaceArbitrary
        ),
        ([first, operator, second, firstWhitespace, secondWhitespace]) => {
          expectResultsToBe(
            tokenize(
              `${firstWhitespace}${first}${secondWhitespace}${operator}${firstWhitespace}${second}${secondWhitespace}`
            ),
            'ok',
            [
              new defaultContext.Decimal(first).toString(),
              operator,
              new defaultContext.Decimal(second).toString(),
            ]
          );
        }
      )
    );
  });

  test('keeps literals with a leading or trailing decimal point', () => {
    expectResultsToBe(tokenize('.5+5.'), 'ok', ['0.5', '+', '5']);
  });

  test('whitespace separates literals', () => {
    expectResultsToBe(tokenize('1 2'), 'ok', ['1', '2']);
  });

  test('nests parenthesized spans into groups', () => {
    expectResultsToBe(tokenize('2*(4+3)'), 'ok', [
      '2',
      '*',
      ['4', '+', '3'],
    ]);
  });

  test('nests groups inside groups', () => {
    expectResultsToBe(tokenize('(1+(2+3))*2'), 'ok', [
      ['1', '+', ['2', '+', '3']],
      '*',
      '2',
    ]);
  });

  test('keeps empty groups', () => {
    expectResultsToBe(tokenize('()'), 'ok', [[]]);
  });

  test('tokenizes long inputs in a single pass', () => {
    const input = Array(10000).fill('1').join('+');

    expect(
      pipe(
        tokenize(input),
        E.map((tokens) => tokens.length)
      )
    ).toEqual(E.right(19999));
  });

  test('empty input has no tokens', () => {
    expectResultsToBe(tokenize(''), 'ok', []);
    expectResultsToBe(tokenize('   '), 'ok', []);
  });

  test('rejects any other character with its position', () => {
    fc.assert(
      fc.property(characterArbitrary, (character) => {
        expectResultsToBe(tokenize(`1+${character}`), 'error', {
          reason: TOKENIZATION_ERROR_CODES.unexpected_character,
          character,
          position: 2,
        });
      })
    );
  });

  test('rejects literals with more than one decimal point', () => {
    expectResultsToBe(tokenize('1.2.3+4'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.invalid_number,
      literal: '1.2.3',
      position: 0,
    });
  });

  test('rejects a lone decimal point', () => {
    expectResultsToBe(tokenize('2*.'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.invalid_number,
      literal: '.',
      position: 2,
    });
  });

  test('rejects a closing parenthesis with nothing open', () => {
    expectResultsToBe(tokenize('1+2)'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.unbalanced_parentheses,
      position: 3,
    });
  });

  test('reports the innermost parenthesis left open', () => {
    expectResultsToBe(tokenize('(1+2'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.unbalanced_parentheses,
      position: 0,
    });
    expectResultsToBe(tokenize('(1+(2'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.unbalanced_parentheses,
      position: 3,
    });
    expectResultsToBe(tokenize('((1)'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.unbalanced_parentheses,
      position: 0,
    });
  });

  test('stops at the first error', () => {
    expectResultsToBe(tokenize('1.2.3)x'), 'error', {
      reason: TOKENIZATION_ERROR_CODES.invalid_number,
      literal: '1.2.3',
      position: 0,
    });
  });
});

function shape(token: Token): TokenShape {
  switch (token.type) {
    case 'number':
      return token.value.toString();
    case 'operator':
      return token.value;
    case 'group':
      return token.children.map(shape);
  }
}

function expectResultsToBe(
  result: ReturnType<typeof tokenize>,
  type: 'ok',
  tokens: TokenShape[]
): void;
function expectResultsToBe(
  result: ReturnType<typeof tokenize>,
  type: 'error',
  error: TokenizationError
): void;
function expectResultsToBe(
  result: ReturnType<typeof tokenize>,
  type: 'ok' | 'error',
  resultValue: TokenShape[] | TokenizationError
) {
  expect(
    pipe(
      result,
      E.map((tokens) => tokens.map(shape))
    )
  ).toEqual(type === 'ok' ? E.right(resultValue) : E.left(resultValue));
}
