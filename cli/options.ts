import * as E from 'fp-ts/Either';

/** The largest precision decimal.js accepts. */
export const MAX_PRECISION = 1e9;

export function parsePrecision(input: string): E.Either<string, number> {
  const parsed = Number(input);

  return Number.isInteger(parsed) && parsed > 0 && parsed <= MAX_PRECISION
    ? E.right(parsed)
    : E.left(`--precision must be an integer between 1 and ${MAX_PRECISION}.`);
}
