export type TokenizationError =
  | {
      reason: 'unexpected_character';
      character: string;
      position: number;
    }
  | {
      reason: 'invalid_number';
      literal: string;
      position: number;
    }
  | {
      reason: 'unbalanced_parentheses';
      position: number;
    };

export const TOKENIZATION_ERROR_CODES = {
  invalid_number: 'invalid_number',
  unbalanced_parentheses: 'unbalanced_parentheses',
  unexpected_character: 'unexpected_character',
} as const;
