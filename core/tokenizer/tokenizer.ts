import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import * as RA from 'fp-ts/ReadonlyArray';
import { pipe } from 'fp-ts/function';
import { CalculatorContext, defaultContext } from '../context';
import { OperatorSymbol, Token } from './tokens';
import { TokenizationError } from './tokenizer_errors';

export type TokenizeResult = E.Either<TokenizationError, ReadonlyArray<Token>>;

type PendingLiteral = Readonly<{
  text: string;
  position: number;
}>;

type OpenGroup = Readonly<{
  tokens: Token[];
  position: number;
}>;

// Token lists are owned by a single tokenize call and filled in place.
type TokenizerState = Readonly<{
  tokens: Token[];
  enclosing: OpenGroup[];
  literal: O.Option<PendingLiteral>;
}>;

type StepResult = E.Either<TokenizationError, TokenizerState>;

const operatorSymbols: ReadonlyArray<OperatorSymbol> = [
  '+',
  '-',
  '*',
  '/',
  '^',
];

const literalCharacter = /[0-9.]/;
const validLiteral = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const whitespace = /\s/;

export function tokenize(
  input: string,
  context: CalculatorContext = defaultContext
): TokenizeResult {
  return pipe(
    Array.from(input),
    RA.reduceWithIndex(
      E.right<TokenizationError, TokenizerState>({
        tokens: [],
        enclosing: [],
        literal: O.none,
      }),
      (position, result, character) =>
        pipe(
          result,
          E.flatMap((state) => step(state, character, position, context))
        )
    ),
    E.flatMap((state) => finish(state, context))
  );
}

function step(
  state: TokenizerState,
  character: string,
  position: number,
  context: CalculatorContext
): StepResult {
  if (literalCharacter.test(character)) {
    return E.right(extendLiteral(state, character, position));
  }

  return pipe(
    flushLiteral(state, context),
    E.flatMap((state) => consume(state, character, position))
  );
}

function consume(
  state: TokenizerState,
  character: string,
  position: number
): StepResult {
  if (whitespace.test(character)) {
    return E.right(state);
  }

  if (isOperatorSymbol(character)) {
    return E.right(
      emit(state, {
        type: 'operator',
        value: character,
      })
    );
  }

  switch (character) {
    case '(':
      state.enclosing.push({ tokens: state.tokens, position });
      return E.right({
        tokens: [],
        enclosing: state.enclosing,
        literal: O.none,
      });
    case ')':
      return closeGroup(state, position);
    default:
      return E.left({
        reason: 'unexpected_character',
        character,
        position,
      });
  }
}

function closeGroup(state: TokenizerState, position: number): StepResult {
  return pipe(
    RA.last(state.enclosing),
    O.match(
      (): StepResult =>
        E.left({
          reason: 'unbalanced_parentheses',
          position,
        }),
      (outer): StepResult => {
        state.enclosing.pop();
        outer.tokens.push({ type: 'group', children: state.tokens });
        return E.right({
          tokens: outer.tokens,
          enclosing: state.enclosing,
          literal: O.none,
        });
      }
    )
  );
}

function finish(
  state: TokenizerState,
  context: CalculatorContext
): TokenizeResult {
  return pipe(
    flushLiteral(state, context),
    E.flatMap(({ tokens, enclosing }) =>
      pipe(
        RA.last(enclosing),
        O.match(
          (): TokenizeResult => E.right(tokens),
          // the innermost parenthesis that was never closed
          ({ position }): TokenizeResult =>
            E.left({
              reason: 'unbalanced_parentheses',
              position,
            })
        )
      )
    )
  );
}

function extendLiteral(
  state: TokenizerState,
  character: string,
  position: number
): TokenizerState {
  return {
    ...state,
    literal: pipe(
      state.literal,
      O.match(
        () => ({ text: character, position }),
        (literal) => ({ ...literal, text: literal.text + character })
      ),
      O.some
    ),
  };
}

function flushLiteral(
  state: TokenizerState,
  context: CalculatorContext
): StepResult {
  return pipe(
    state.literal,
    O.match(
      (): StepResult => E.right(state),
      (literal) =>
        pipe(
          parseLiteral(literal, context),
          E.map((token) => emit({ ...state, literal: O.none }, token))
        )
    )
  );
}

function parseLiteral(
  { text, position }: PendingLiteral,
  context: CalculatorContext
): E.Either<TokenizationError, Token> {
  return validLiteral.test(text)
    ? E.right({ type: 'number', value: new context.Decimal(text) })
    : E.left({ reason: 'invalid_number', literal: text, position });
}

function emit(state: TokenizerState, token: Token): TokenizerState {
  state.tokens.push(token);
  return state;
}

function isOperatorSymbol(character: string): character is OperatorSymbol {
  return operatorSymbols.some((symbol) => symbol === character);
}
