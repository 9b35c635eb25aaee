import type { FormulaEvalError } from './errors';

export type FieldName = 'Open' | 'High' | 'Low' | 'Close' | 'Volume';
export type FunctionName = 'abs' | 'max' | 'min';

export type ArithmeticOp = '+' | '-' | '*' | '/';
export type CompareOp = '>' | '<' | '>=' | '<=' | '==' | '!=';
export type BoolOp = 'and' | 'or';
export type UnaryOp = '-' | '+' | 'not';

export type Value = number | boolean;

/**
 * Formula syntax tree. Closed set of node kinds; the evaluator switches
 * exhaustively on `kind`, so nothing outside this union can be executed.
 */
export type FormulaNode =
  | { readonly kind: 'literal'; readonly value: Value }
  /** offset is 0 for the latest candle, -k for k candles back */
  | { readonly kind: 'field'; readonly field: FieldName; readonly offset: number }
  | { readonly kind: 'unary'; readonly op: UnaryOp; readonly operand: FormulaNode }
  | { readonly kind: 'binary'; readonly op: ArithmeticOp; readonly left: FormulaNode; readonly right: FormulaNode }
  /** a < b <= c: operands.length === ops.length + 1 */
  | { readonly kind: 'compare'; readonly ops: readonly CompareOp[]; readonly operands: readonly FormulaNode[] }
  | { readonly kind: 'bool'; readonly op: BoolOp; readonly operands: readonly FormulaNode[] }
  | { readonly kind: 'call'; readonly fn: FunctionName; readonly args: readonly FormulaNode[] };

export interface CompiledFormula {
  readonly source: string;
  readonly ast: FormulaNode;
  /** Deepest lookback referenced, as a positive candle count (Close[-4] → 4) */
  readonly maxLookback: number;
}

export type EvalResult =
  | { ok: true; value: boolean }
  | { ok: false; error: FormulaEvalError };

export const FIELD_NAMES: readonly FieldName[] = ['Open', 'High', 'Low', 'Close', 'Volume'];

/** Allowed functions and their arity bounds (max undefined = variadic) */
export const FUNCTION_ARITY: Readonly<Record<FunctionName, { min: number; max?: number }>> = {
  abs: { min: 1, max: 1 },
  max: { min: 2 },
  min: { min: 2 },
};

export function isFieldName(name: string): name is FieldName {
  return FIELD_NAMES.some(f => f === name);
}

export function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(FUNCTION_ARITY, name);
}
