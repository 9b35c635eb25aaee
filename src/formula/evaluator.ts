import type { Candle, CandleWindow } from '../market/types';
import { FormulaEvalError } from './errors';
import {
  CompiledFormula, CompareOp, EvalResult, FieldName, FormulaNode, FunctionName, Value,
  FUNCTION_ARITY, isFieldName,
} from './types';

export const DEFAULT_MIN_WINDOW = 3;

export interface EvaluateOptions {
  /** Windows shorter than this are vacuously not triggered */
  minWindow?: number;
}

const FIELD_KEYS: Record<FieldName, keyof Omit<Candle, 'timestamp'>> = {
  Open: 'open',
  High: 'high',
  Low: 'low',
  Close: 'close',
  Volume: 'volume',
};

export function truthy(value: Value): boolean {
  if (typeof value === 'boolean') return value;
  return value !== 0 && !Number.isNaN(value);
}

function num(value: Value, context: string): number {
  if (typeof value !== 'number') {
    throw new FormulaEvalError('type', `${context} expects a number, got ${value}`);
  }
  return value;
}

function lookup(window: CandleWindow, field: string, offset: number): number {
  if (!isFieldName(field)) {
    throw new FormulaEvalError('unknown-field', `Unknown field "${field}"`);
  }
  const index = window.length - 1 + offset;
  if (offset > 0 || index < 0) {
    throw new FormulaEvalError('offset-out-of-range', `${field}[${offset}] is outside a window of ${window.length} candles`);
  }
  const value = window[index][FIELD_KEYS[field]];
  if (!Number.isFinite(value)) {
    throw new FormulaEvalError('non-finite', `${field}[${offset}] is not a finite number`);
  }
  return value;
}

function compare(op: CompareOp, a: Value, b: Value): boolean {
  if (op === '==' || op === '!=') {
    if (typeof a !== typeof b) {
      throw new FormulaEvalError('type', `Cannot compare ${typeof a} with ${typeof b}`);
    }
    return op === '==' ? a === b : a !== b;
  }
  const x = num(a, `"${op}"`);
  const y = num(b, `"${op}"`);
  switch (op) {
    case '>': return x > y;
    case '<': return x < y;
    case '>=': return x >= y;
    case '<=': return x <= y;
  }
}

function call(fn: FunctionName, args: number[]): number {
  const arity = FUNCTION_ARITY[fn];
  if (args.length < arity.min || (arity.max !== undefined && args.length > arity.max)) {
    throw new FormulaEvalError('arity', `${fn}() called with ${args.length} argument(s)`);
  }
  switch (fn) {
    case 'abs': return Math.abs(args[0]);
    case 'max': return Math.max(...args);
    case 'min': return Math.min(...args);
  }
}

function evalNode(node: FormulaNode, window: CandleWindow): Value {
  switch (node.kind) {
    case 'literal':
      return node.value;

    case 'field':
      return lookup(window, node.field, node.offset);

    case 'unary': {
      const operand = evalNode(node.operand, window);
      if (node.op === 'not') return !truthy(operand);
      const n = num(operand, `unary "${node.op}"`);
      return node.op === '-' ? -n : n;
    }

    case 'binary': {
      const left = num(evalNode(node.left, window), `"${node.op}"`);
      const right = num(evalNode(node.right, window), `"${node.op}"`);
      switch (node.op) {
        case '+': return left + right;
        case '-': return left - right;
        case '*': return left * right;
        case '/':
          if (right === 0) throw new FormulaEvalError('division-by-zero', 'Division by zero');
          return left / right;
      }
    }

    case 'compare': {
      // a < b < c is a < b and b < c, with b evaluated once
      let left = evalNode(node.operands[0], window);
      for (let i = 0; i < node.ops.length; i++) {
        const right = evalNode(node.operands[i + 1], window);
        if (!compare(node.ops[i], left, right)) return false;
        left = right;
      }
      return true;
    }

    case 'bool': {
      // Left-to-right fold, short-circuiting like and/or in ordinary code
      let result = evalNode(node.operands[0], window);
      for (let i = 1; i < node.operands.length; i++) {
        if (node.op === 'and' ? !truthy(result) : truthy(result)) return result;
        result = evalNode(node.operands[i], window);
      }
      return result;
    }

    case 'call':
      return call(node.fn, node.args.map(arg => num(evalNode(arg, window), `${node.fn}()`)));
  }
}

/**
 * Evaluate a compiled formula against one symbol's window. Data and runtime
 * problems come back as `{ ok: false }`; a legitimately false condition is
 * `{ ok: true, value: false }`.
 */
export function evaluateFormula(
  formula: CompiledFormula,
  window: CandleWindow,
  options: EvaluateOptions = {},
): EvalResult {
  const minWindow = options.minWindow ?? DEFAULT_MIN_WINDOW;
  if (window.length < minWindow) {
    return {
      ok: false,
      error: new FormulaEvalError('insufficient-window', `Need ${minWindow} candles, have ${window.length}`),
    };
  }

  try {
    return { ok: true, value: truthy(evalNode(formula.ast, window)) };
  } catch (err) {
    if (err instanceof FormulaEvalError) return { ok: false, error: err };
    throw err;
  }
}
