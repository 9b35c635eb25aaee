import { describe, it, expect } from 'vitest';
import {
  compileFormula, validateFormula, parseFormula, tokenize,
  FormulaParseError, ParseErrorCode,
} from '../src/formula';

function codeOf(source: string): ParseErrorCode | 'compiled' {
  try {
    compileFormula(source);
    return 'compiled';
  } catch (err) {
    if (err instanceof FormulaParseError) return err.code;
    throw err;
  }
}

describe('tokenize', () => {
  it('splits operators, fields and numbers', () => {
    const tokens = tokenize('Close[-1] >= 1.5e2');
    expect(tokens.map(t => t.type)).toEqual(['ident', 'punct', 'punct', 'number', 'punct', 'punct', 'number', 'eof']);
    const last = tokens[6];
    expect(last.type === 'number' && last.value).toBe(150);
  });

  it('reads leading-dot decimals', () => {
    const [tok] = tokenize('.5');
    expect(tok).toEqual({ type: 'number', value: 0.5, pos: 0 });
  });
});

describe('compileFormula', () => {
  it('compiles a plain comparison', () => {
    const formula = compileFormula('Close > Open');
    expect(formula.source).toBe('Close > Open');
    expect(formula.ast).toEqual({
      kind: 'compare',
      ops: ['>'],
      operands: [
        { kind: 'field', field: 'Close', offset: 0 },
        { kind: 'field', field: 'Open', offset: 0 },
      ],
    });
  });

  it('binds * tighter than +', () => {
    expect(parseFormula('1 + 2 * 3')).toEqual({
      kind: 'binary',
      op: '+',
      left: { kind: 'literal', value: 1 },
      right: {
        kind: 'binary',
        op: '*',
        left: { kind: 'literal', value: 2 },
        right: { kind: 'literal', value: 3 },
      },
    });
  });

  it('binds and tighter than or', () => {
    const ast = parseFormula('Close > 1 or Open > 1 and Volume > 1');
    expect(ast.kind).toBe('bool');
    if (ast.kind !== 'bool') return;
    expect(ast.op).toBe('or');
    expect(ast.operands).toHaveLength(2);
    expect(ast.operands[1].kind).toBe('bool');
  });

  it('keeps a comparison chain as one node', () => {
    const ast = parseFormula('1 < Close <= 20');
    expect(ast.kind === 'compare' && ast.ops).toEqual(['<', '<=']);
  });

  it('accepts historical offsets and zero offset', () => {
    expect(parseFormula('Close[-3]')).toEqual({ kind: 'field', field: 'Close', offset: -3 });
    expect(parseFormula('Close[0]')).toEqual({ kind: 'field', field: 'Close', offset: 0 });
    expect(parseFormula('Close[-0]')).toEqual({ kind: 'field', field: 'Close', offset: 0 });
  });

  it('accepts allow-listed calls, boolean literals and not', () => {
    expect(codeOf('abs(Close - Open) > max(1, 2, 3)')).toBe('compiled');
    expect(codeOf('min(Low, Low[-1]) < 5')).toBe('compiled');
    expect(codeOf('(Close > Open) == True')).toBe('compiled');
    expect(codeOf('not not Close > Open')).toBe('compiled');
    expect(codeOf('not (Close > Open)')).toBe('compiled');
  });

  it('records the deepest lookback', () => {
    expect(compileFormula('Close[-4] > Close').maxLookback).toBe(4);
    expect(compileFormula('Close > Open').maxLookback).toBe(0);
    expect(compileFormula('max(High[-1], High[-7]) < 3').maxLookback).toBe(7);
  });

  it('memoizes by formula text and freezes the result', () => {
    const a = compileFormula('High - Low > 2');
    const b = compileFormula('High - Low > 2');
    expect(a).toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.ast)).toBe(true);
  });

  it.each<[string, ParseErrorCode]>([
    ["__import__('os')", 'string-literal'],
    ['Close.foo', 'attribute-access'],
    ['Close.5', 'attribute-access'],
    ['eval(Close)', 'unknown-function'],
    ['open(Close)', 'unknown-function'],
    ['Close(1)', 'disallowed-call'],
    ['abs(1)(2)', 'disallowed-call'],
    ['x = 1', 'assignment'],
    ['Close := 1', 'assignment'],
    ['Foo > 1', 'unknown-identifier'],
    ['close > open', 'unknown-identifier'],
    ['Close[1] > 0', 'bad-offset'],
    ['Close[-1.5] > 0', 'bad-offset'],
    ['Close[-Open] > 0', 'bad-offset'],
    ['Close[-1 + 1] > 0', 'bad-offset'],
    ['abs(Close)[0] > 0', 'bad-offset'],
    ['abs(1, 2) > 0', 'arity'],
    ['max(Close) > 0', 'arity'],
    ['min() > 0', 'arity'],
    ['Close ** 2 > 0', 'unexpected-token'],
    ['[x for x in Close]', 'unexpected-token'],
    ['Close > Open Open', 'unexpected-token'],
    ['max(1, 2,) > 0', 'unexpected-token'],
    ['Close > ', 'unexpected-end'],
    ['Close > Open and', 'unexpected-end'],
    ['(Close > Open', 'unexpected-end'],
    ['Close % 2', 'unexpected-char'],
    ['Close > Open; 1', 'unexpected-char'],
    ['lambda: 1', 'unexpected-char'],
    ['1abc > 0', 'unexpected-char'],
    ['', 'empty'],
    ['   ', 'empty'],
  ])('rejects %j with %s', (source, code) => {
    expect(codeOf(source)).toBe(code);
  });

  it('rejects over-long formulas', () => {
    expect(codeOf('1'.repeat(1001))).toBe('too-long');
  });

  it('rejects runaway nesting', () => {
    expect(codeOf('('.repeat(70) + '1' + ')'.repeat(70))).toBe('too-deep');
    expect(codeOf('-'.repeat(70) + '1')).toBe('too-deep');
  });

  it('reports the position of the offending token', () => {
    try {
      compileFormula('Close > Foo');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormulaParseError);
      if (!(err instanceof FormulaParseError)) return;
      expect(err.position).toBe(8);
      expect(err.message).toBe('Unknown field "Foo" (at 8)');
    }
  });
});

describe('validateFormula', () => {
  it('returns parse errors instead of throwing', () => {
    const result = validateFormula('Close >> Open');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('unexpected-token');
  });

  it('returns the compiled formula on success', () => {
    const result = validateFormula('Volume > 0');
    expect(result.ok && result.formula.source).toBe('Volume > 0');
  });
});
