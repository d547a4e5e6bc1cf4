import * as E from 'fp-ts/Either';
import * as O from 'fp-ts/Option';
import * as RA from 'fp-ts/ReadonlyArray';
import { pipe } from 'fp-ts/function';
import { Decimal } from 'decimal.js';
import { CalculatorContext, defaultContext } from '../context';
import {
  NumberToken,
  OperatorSymbol,
  OperatorToken,
  Token,
} from '../tokenizer/tokens';
import { InterpretationError } from './interpreter_errors';
import {
  OPERATORS,
  PRECEDENCE_TIERS,
  PrecedenceTier,
  operate,
} from './operators';

export type InterpretationResult = E.Either<InterpretationError, Decimal>;

type ResolvedToken = NumberToken | OperatorToken;

type Link = readonly [OperatorSymbol, Decimal];

/**
 * An operand followed by operator/operand pairs: the only shape a resolved
 * token sequence may take.
 */
type Chain = Readonly<{
  head: Decimal;
  links: ReadonlyArray<Link>;
}>;

type ChainResult = E.Either<InterpretationError, Chain>;

/** Links read so far, and the operator still waiting for its operand. */
type LinkReader = {
  links: Link[];
  operator: O.Option<OperatorSymbol>;
};

/** Accumulator of a single tier reduction, filled in place. */
type ReducedChain = {
  head: Decimal;
  links: Link[];
};

export function interpret(
  tokens: ReadonlyArray<Token>,
  context: CalculatorContext = defaultContext
): InterpretationResult {
  return pipe(
    tokens,
    E.traverseArray((token) => resolveGroup(token, context)),
    E.flatMap(readChain),
    E.flatMap((chain) =>
      pipe(
        PRECEDENCE_TIERS,
        RA.reduce(E.right<InterpretationError, Chain>(chain), (result, tier) =>
          pipe(
            result,
            E.flatMap((reduced) => reduceTier(reduced, tier))
          )
        )
      )
    ),
    E.flatMap(
      ({ head, links }): InterpretationResult =>
        links.length === 0 ? E.right(head) : malformed('operator')
    )
  );
}

function resolveGroup(
  token: Token,
  context: CalculatorContext
): E.Either<InterpretationError, ResolvedToken> {
  switch (token.type) {
    case 'group':
      return pipe(
        interpret(token.children, context),
        E.map((value): ResolvedToken => ({ type: 'number', value }))
      );
    default:
      return E.right(token);
  }
}

function readChain(tokens: ReadonlyArray<ResolvedToken>): ChainResult {
  return pipe(
    tokens,
    RA.matchLeft(
      (): ChainResult => malformed('operand'),
      (first, rest): ChainResult =>
        first.type === 'number'
          ? readLinks(first.value, rest)
          : malformed('operand')
    )
  );
}

function readLinks(
  head: Decimal,
  tokens: ReadonlyArray<ResolvedToken>
): ChainResult {
  return pipe(
    tokens,
    RA.reduce(
      E.right<InterpretationError, LinkReader>({ links: [], operator: O.none }),
      (result, token) =>
        pipe(
          result,
          E.flatMap((reader) => readLink(reader, token))
        )
    ),
    E.flatMap(
      ({ links, operator }): ChainResult =>
        O.isSome(operator) ? malformed('operand') : E.right({ head, links })
    )
  );
}

function readLink(
  reader: LinkReader,
  token: ResolvedToken
): E.Either<InterpretationError, LinkReader> {
  return pipe(
    reader.operator,
    O.match(
      (): E.Either<InterpretationError, LinkReader> =>
        token.type === 'operator'
          ? E.right({ links: reader.links, operator: O.some(token.value) })
          : malformed('operator'),
      (operator): E.Either<InterpretationError, LinkReader> => {
        if (token.type !== 'number') {
          return malformed('operand');
        }

        reader.links.push([operator, token.value]);
        return E.right({ links: reader.links, operator: O.none });
      }
    )
  );
}

/**
 * Folds the chain left to right, applying every operator of `tier` to the
 * running operand on its left as soon as it is reached.
 */
function reduceTier(chain: Chain, tier: PrecedenceTier): ChainResult {
  return pipe(
    chain.links,
    RA.reduce(
      E.right<InterpretationError, ReducedChain>({
        head: chain.head,
        links: [],
      }),
      (result, [operator, right]) =>
        pipe(
          result,
          E.flatMap(
            (reduced): E.Either<InterpretationError, ReducedChain> =>
              OPERATORS[operator].tier === tier
                ? pipe(
                    operate(lastOperand(reduced), operator, right),
                    E.map((value) => replaceLastOperand(reduced, value))
                  )
                : E.right(appendLink(reduced, [operator, right]))
          )
        )
    )
  );
}

function lastOperand({ head, links }: Chain): Decimal {
  return pipe(
    RA.last(links),
    O.match(
      () => head,
      ([, operand]) => operand
    )
  );
}

function replaceLastOperand(
  reduced: ReducedChain,
  value: Decimal
): ReducedChain {
  const last = reduced.links.length - 1;

  if (last < 0) {
    reduced.head = value;
  } else {
    reduced.links[last] = [reduced.links[last][0], value];
  }

  return reduced;
}

function appendLink(reduced: ReducedChain, link: Link): ReducedChain {
  reduced.links.push(link);
  return reduced;
}

function malformed(
  expected: 'operand' | 'operator'
): E.Either<InterpretationError, never> {
  return E.left({
    reason: 'malformed_expression',
    expected,
  });
}
