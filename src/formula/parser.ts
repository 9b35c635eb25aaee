import { FormulaParseError } from './errors';
import { tokenize, Token, Punct } from './lexer';
import {
  FormulaNode, CompareOp, FUNCTION_ARITY,
  isFieldName, isFunctionName,
} from './types';

export const MAX_NESTING_DEPTH = 64;

const COMPARE_OPS: readonly Punct[] = ['>', '<', '>=', '<=', '==', '!='];
const KEYWORDS = new Set(['and', 'or', 'not']);
const BOOLEAN_LITERALS: Record<string, boolean> = { True: true, False: false, true: true, false: false };

function isCompareOp(text: Punct): text is CompareOp {
  return COMPARE_OPS.includes(text);
}

function describe(tok: Token): string {
  switch (tok.type) {
    case 'number': return `number ${tok.value}`;
    case 'ident': return `"${tok.name}"`;
    case 'punct': return `"${tok.text}"`;
    case 'eof': return 'end of formula';
  }
}

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): FormulaNode {
    if (this.peek().type === 'eof') {
      throw new FormulaParseError('empty', 'Formula is empty', 0);
    }
    const node = this.parseOr();
    const tail = this.peek();
    if (tail.type !== 'eof') {
      throw this.unexpected(tail);
    }
    return node;
  }

  // --- Token helpers ---

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const tok = this.tokens[this.pos];
    if (tok.type !== 'eof') this.pos++;
    return tok;
  }

  private isPunct(text: Punct): boolean {
    const tok = this.peek();
    return tok.type === 'punct' && tok.text === text;
  }

  private isKeyword(word: string): boolean {
    const tok = this.peek();
    return tok.type === 'ident' && tok.name === word;
  }

  private expectPunct(text: Punct): void {
    if (!this.isPunct(text)) throw this.unexpected(this.peek(), `expected "${text}"`);
    this.advance();
  }

  private unexpected(tok: Token, hint?: string): FormulaParseError {
    const suffix = hint ? `, ${hint}` : '';
    if (tok.type === 'eof') {
      return new FormulaParseError('unexpected-end', `Unexpected end of formula${suffix}`, tok.pos);
    }
    return new FormulaParseError('unexpected-token', `Unexpected ${describe(tok)}${suffix}`, tok.pos);
  }

  private nested<T>(fn: () => T): T {
    if (++this.depth > MAX_NESTING_DEPTH) {
      throw new FormulaParseError('too-deep', `Formula nests deeper than ${MAX_NESTING_DEPTH} levels`, this.peek().pos);
    }
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  // --- Grammar ---

  private parseOr(): FormulaNode {
    const operands = [this.parseAnd()];
    while (this.isKeyword('or')) {
      this.advance();
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'or', operands };
  }

  private parseAnd(): FormulaNode {
    const operands = [this.parseNot()];
    while (this.isKeyword('and')) {
      this.advance();
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'and', operands };
  }

  private parseNot(): FormulaNode {
    if (this.isKeyword('not')) {
      this.advance();
      return this.nested<FormulaNode>(() => ({ kind: 'unary', op: 'not', operand: this.parseNot() }));
    }
    return this.parseComparison();
  }

  private parseComparison(): FormulaNode {
    const first = this.parseAdditive();
    const ops: CompareOp[] = [];
    const operands: FormulaNode[] = [first];
    for (;;) {
      const tok = this.peek();
      if (tok.type !== 'punct' || !isCompareOp(tok.text)) break;
      this.advance();
      ops.push(tok.text);
      operands.push(this.parseAdditive());
    }
    return ops.length === 0 ? first : { kind: 'compare', ops, operands };
  }

  private parseAdditive(): FormulaNode {
    let left = this.parseTerm();
    for (;;) {
      const tok = this.peek();
      if (tok.type !== 'punct' || (tok.text !== '+' && tok.text !== '-')) return left;
      this.advance();
      left = { kind: 'binary', op: tok.text, left, right: this.parseTerm() };
    }
  }

  private parseTerm(): FormulaNode {
    let left = this.parseUnary();
    for (;;) {
      const tok = this.peek();
      if (tok.type !== 'punct' || (tok.text !== '*' && tok.text !== '/')) return left;
      this.advance();
      left = { kind: 'binary', op: tok.text, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): FormulaNode {
    const tok = this.peek();
    if (tok.type === 'punct' && (tok.text === '-' || tok.text === '+')) {
      this.advance();
      const op = tok.text;
      return this.nested<FormulaNode>(() => ({ kind: 'unary', op, operand: this.parseUnary() }));
    }
    return this.parsePostfix();
  }

  /** A primary may not be called or subscripted unless it is an allow-listed name or field. */
  private parsePostfix(): FormulaNode {
    const node = this.parsePrimary();
    const tok = this.peek();
    if (tok.type === 'punct' && tok.text === '(') {
      throw new FormulaParseError('disallowed-call', 'Only abs, max and min may be called', tok.pos);
    }
    if (tok.type === 'punct' && tok.text === '[') {
      throw new FormulaParseError('bad-offset', 'Only fields can be indexed', tok.pos);
    }
    return node;
  }

  private parsePrimary(): FormulaNode {
    const tok = this.advance();

    switch (tok.type) {
      case 'number':
        return { kind: 'literal', value: tok.value };

      case 'punct':
        if (tok.text === '(') {
          const inner = this.nested(() => this.parseOr());
          this.expectPunct(')');
          return inner;
        }
        throw this.unexpected(tok);

      case 'eof':
        throw this.unexpected(tok);

      case 'ident':
        return this.parseName(tok.name, tok.pos);
    }
  }

  private parseName(name: string, pos: number): FormulaNode {
    if (KEYWORDS.has(name)) {
      throw this.unexpected({ type: 'ident', name, pos });
    }
    if (Object.prototype.hasOwnProperty.call(BOOLEAN_LITERALS, name)) {
      return { kind: 'literal', value: BOOLEAN_LITERALS[name] };
    }

    if (this.isPunct('(')) {
      if (!isFunctionName(name)) {
        const code = isFieldName(name) ? 'disallowed-call' : 'unknown-function';
        throw new FormulaParseError(code, `Function "${name}" is not allowed`, pos);
      }
      this.advance();
      const args = this.nested(() => this.parseArgs());
      const arity = FUNCTION_ARITY[name];
      if (args.length < arity.min || (arity.max !== undefined && args.length > arity.max)) {
        const expected = arity.max === arity.min ? `${arity.min}` : `at least ${arity.min}`;
        throw new FormulaParseError('arity', `${name}() takes ${expected} argument(s), got ${args.length}`, pos);
      }
      return { kind: 'call', fn: name, args };
    }

    if (isFieldName(name)) {
      const offset = this.isPunct('[') ? this.parseOffset() : 0;
      return { kind: 'field', field: name, offset };
    }

    throw new FormulaParseError('unknown-identifier', `Unknown field "${name}"`, pos);
  }

  private parseArgs(): FormulaNode[] {
    const args: FormulaNode[] = [];
    if (this.isPunct(')')) {
      this.advance();
      return args;
    }
    for (;;) {
      args.push(this.parseOr());
      if (this.isPunct(',')) {
        this.advance();
        continue;
      }
      this.expectPunct(')');
      return args;
    }
  }

  /** `[0]` or `[-k]` with a literal integer k; anything else is rejected. */
  private parseOffset(): number {
    const open = this.advance();
    const negative = this.isPunct('-');
    if (negative) this.advance();

    const tok = this.advance();
    if (tok.type !== 'number' || !Number.isSafeInteger(tok.value)) {
      throw new FormulaParseError('bad-offset', 'Offsets must be literal integers like [-1]', tok.pos);
    }
    if (!negative && tok.value !== 0) {
      throw new FormulaParseError('bad-offset', 'Offsets must be zero or negative', tok.pos);
    }
    if (!this.isPunct(']')) {
      throw new FormulaParseError('bad-offset', 'Offsets must be literal integers like [-1]', open.pos);
    }
    this.advance();
    return tok.value === 0 ? 0 : -tok.value;
  }
}

export function parseFormula(source: string): FormulaNode {
  const tokens = tokenize(source);
  return new Parser(tokens).parse();
}
