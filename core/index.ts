export { evaluate } from './calculator';
export type { CalculationResult, CalculatorError } from './calculator';
export { createContext, defaultContext, DEFAULT_PRECISION } from './context';
export type { CalculatorContext, CalculatorOptions } from './context';
export { formatError, formatResult } from './format';
export { interpret } from './interpreter/interpret';
export type { InterpretationResult } from './interpreter/interpret';
export { INTERPRETATION_ERROR_CODES } from './interpreter/interpreter_errors';
export type { InterpretationError } from './interpreter/interpreter_errors';
export { tokenize } from './tokenizer/tokenizer';
export type { TokenizeResult } from './tokenizer/tokenizer';
export { TOKENIZATION_ERROR_CODES } from './tokenizer/tokenizer_errors';
export type { TokenizationError } from './tokenizer/tokenizer_errors';
export type {
  GroupToken,
  NumberToken,
  OperatorSymbol,
  OperatorToken,
  Token,
} from './tokenizer/tokens';
