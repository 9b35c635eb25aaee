export type ParseErrorCode =
  | 'empty'
  | 'too-long'
  | 'too-deep'
  | 'unexpected-char'
  | 'string-literal'
  | 'attribute-access'
  | 'assignment'
  | 'unknown-identifier'
  | 'unknown-function'
  | 'disallowed-call'
  | 'arity'
  | 'bad-offset'
  | 'unexpected-token'
  | 'unexpected-end';

/** Formula text is outside the allowed grammar. Raised by compileFormula only. */
export class FormulaParseError extends Error {
  readonly code: ParseErrorCode;
  readonly position: number;

  constructor(code: ParseErrorCode, message: string, position: number) {
    super(`${message} (at ${position})`);
    this.name = 'FormulaParseError';
    this.code = code;
    this.position = position;
  }
}

export type EvalErrorKind =
  | 'unknown-field'
  | 'offset-out-of-range'
  | 'division-by-zero'
  | 'type'
  | 'arity'
  | 'insufficient-window'
  | 'non-finite';

export class FormulaEvalError extends Error {
  readonly kind: EvalErrorKind;

  constructor(kind: EvalErrorKind, message: string) {
    super(message);
    this.name = 'FormulaEvalError';
    this.kind = kind;
  }
}
