import { createLogger } from '../utils/logger';
import type { CandleWindow } from '../market/types';
import { FormulaParseError } from './errors';
import { parseFormula } from './parser';
import { evaluateFormula, EvaluateOptions } from './evaluator';
import type { CompiledFormula, FormulaNode } from './types';

const log = createLogger('formula');

const CACHE_MAX = 256;
const compiled = new Map<string, CompiledFormula>();

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

function lookback(node: FormulaNode): number {
  switch (node.kind) {
    case 'literal': return 0;
    case 'field': return Math.abs(node.offset);
    case 'unary': return lookback(node.operand);
    case 'binary': return Math.max(lookback(node.left), lookback(node.right));
    case 'compare':
    case 'bool': return Math.max(...node.operands.map(lookback));
    case 'call': return Math.max(...node.args.map(lookback));
  }
}

/**
 * Parse formula text into an immutable expression. Throws FormulaParseError
 * for anything outside the grammar. Results are memoized per exact string.
 */
export function compileFormula(source: string): CompiledFormula {
  const hit = compiled.get(source);
  if (hit) return hit;

  const ast = parseFormula(source);
  const formula = deepFreeze<CompiledFormula>({ source, ast, maxLookback: lookback(ast) });

  if (compiled.size >= CACHE_MAX) {
    const oldest = compiled.keys().next();
    if (!oldest.done) compiled.delete(oldest.value);
  }
  compiled.set(source, formula);
  return formula;
}

export type ValidationResult =
  | { ok: true; formula: CompiledFormula }
  | { ok: false; error: FormulaParseError };

/** Like compileFormula, but returns parse errors instead of throwing them. */
export function validateFormula(source: string): ValidationResult {
  try {
    return { ok: true, formula: compileFormula(source) };
  } catch (err) {
    if (err instanceof FormulaParseError) return { ok: false, error: err };
    throw err;
  }
}

export interface CheckOptions extends EvaluateOptions {
  /** Only used to label debug logs */
  symbol?: string;
}

/**
 * Fail-closed trigger check: true only when the formula parses, evaluates
 * cleanly and is satisfied. Never throws.
 */
export function checkFormula(source: string | CompiledFormula, window: CandleWindow, options: CheckOptions = {}): boolean {
  try {
    const validated = typeof source === 'string' ? validateFormula(source) : { ok: true as const, formula: source };
    if (!validated.ok) {
      log.debug('Formula rejected', { symbol: options.symbol, code: validated.error.code, error: validated.error.message });
      return false;
    }

    const result = evaluateFormula(validated.formula, window, options);
    if (!result.ok) {
      log.debug('Formula evaluation failed', { symbol: options.symbol, kind: result.error.kind, error: result.error.message });
      return false;
    }
    return result.value;
  } catch (err) {
    log.error('Unexpected error while checking formula', { symbol: options.symbol, error: err });
    return false;
  }
}

export { evaluateFormula, truthy, DEFAULT_MIN_WINDOW } from './evaluator';
export type { EvaluateOptions } from './evaluator';
export { parseFormula, MAX_NESTING_DEPTH } from './parser';
export { tokenize, MAX_FORMULA_LENGTH } from './lexer';
export { FormulaParseError, FormulaEvalError } from './errors';
export type { ParseErrorCode, EvalErrorKind } from './errors';
export type { CompiledFormula, FormulaNode, FieldName, FunctionName, EvalResult, Value } from './types';
export { FIELD_NAMES } from './types';
