import { FormulaParseError } from './errors';

export type Punct =
  | '(' | ')' | '[' | ']' | ','
  | '+' | '-' | '*' | '/'
  | '>' | '<' | '>=' | '<=' | '==' | '!=';

export type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'ident'; name: string; pos: number }
  | { type: 'punct'; text: Punct; pos: number }
  | { type: 'eof'; pos: number };

export const MAX_FORMULA_LENGTH = 1000;

const SINGLE: Record<string, Punct> = {
  '(': '(', ')': ')', '[': '[', ']': ']', ',': ',',
  '+': '+', '-': '-', '*': '*', '/': '/',
};

const isDigit = (c: string) => c >= '0' && c <= '9';
const isIdentStart = (c: string) => /[A-Za-z_]/.test(c);
const isIdentPart = (c: string) => /[A-Za-z0-9_]/.test(c);
const isSpace = (c: string) => c === ' ' || c === '\t' || c === '\n' || c === '\r';

function readNumber(src: string, start: number): { value: number; end: number } {
  let i = start;
  while (i < src.length && isDigit(src[i])) i++;
  if (src[i] === '.') {
    i++;
    while (i < src.length && isDigit(src[i])) i++;
  }
  if (src[i] === 'e' || src[i] === 'E') {
    let j = i + 1;
    if (src[j] === '+' || src[j] === '-') j++;
    if (isDigit(src[j] ?? '')) {
      while (j < src.length && isDigit(src[j])) j++;
      i = j;
    }
  }
  if (i < src.length && isIdentPart(src[i])) {
    throw new FormulaParseError('unexpected-char', `Invalid number literal "${src.slice(start, i + 1)}"`, start);
  }
  return { value: Number(src.slice(start, i)), end: i };
}

export function tokenize(src: string): Token[] {
  if (src.length > MAX_FORMULA_LENGTH) {
    throw new FormulaParseError('too-long', `Formula exceeds ${MAX_FORMULA_LENGTH} characters`, MAX_FORMULA_LENGTH);
  }

  const tokens: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const c = src[i];

    if (isSpace(c)) {
      i++;
      continue;
    }

    if (isDigit(c) || (c === '.' && isDigit(src[i + 1] ?? ''))) {
      const prev = tokens[tokens.length - 1];
      if (c === '.' && prev && (prev.type === 'ident' || (prev.type === 'punct' && (prev.text === ')' || prev.text === ']')))) {
        throw new FormulaParseError('attribute-access', 'Attribute access is not allowed', i);
      }
      const { value, end } = readNumber(src, i);
      tokens.push({ type: 'number', value, pos: i });
      i = end;
      continue;
    }

    if (isIdentStart(c)) {
      const start = i;
      while (i < src.length && isIdentPart(src[i])) i++;
      tokens.push({ type: 'ident', name: src.slice(start, i), pos: start });
      continue;
    }

    if (c === '.') {
      throw new FormulaParseError('attribute-access', 'Attribute access is not allowed', i);
    }
    if (c === '"' || c === "'") {
      throw new FormulaParseError('string-literal', 'String literals are not allowed', i);
    }

    const next = src[i + 1];
    if (c === '>' || c === '<') {
      const text: Punct = next === '=' ? (c === '>' ? '>=' : '<=') : c;
      tokens.push({ type: 'punct', text, pos: i });
      i += text.length;
      continue;
    }
    if (c === '=') {
      if (next !== '=') throw new FormulaParseError('assignment', 'Assignment is not allowed', i);
      tokens.push({ type: 'punct', text: '==', pos: i });
      i += 2;
      continue;
    }
    if (c === '!' && next === '=') {
      tokens.push({ type: 'punct', text: '!=', pos: i });
      i += 2;
      continue;
    }
    if (c === ':' && next === '=') {
      throw new FormulaParseError('assignment', 'Assignment is not allowed', i);
    }

    const single = SINGLE[c];
    if (single === undefined) {
      throw new FormulaParseError('unexpected-char', `Unexpected character "${c}"`, i);
    }
    tokens.push({ type: 'punct', text: single, pos: i });
    i++;
  }

  tokens.push({ type: 'eof', pos: src.length });
  return tokens;
}
