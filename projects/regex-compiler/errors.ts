import type { Span } from './LexToken.js';

export type RegexSyntaxErrorCode =
  | 'UNBALANCED_PARENTHESES' // ( without ), or ) without (
  | 'DANGLING_OPERATOR' // * or | missing an operand
  | 'UNSUPPORTED_SYMBOL' // anything besides letters, digits, ( ) | *
  | 'EMPTY_GROUP' // ()
  | 'EMPTY_EXPRESSION'; // empty pattern

export const atString = (span: Span) => `${span.from}`;

// spans count UTF-16 code units, columns count code points
const columns = (text: string) => [...text].length;

const atSource = (source: string, span: Span): string[] => {
  const offset = columns(source.slice(0, span.from));
  const width = Math.max(1, columns(source.slice(span.from, span.to)));
  return [source, '-'.repeat(offset) + '^'.repeat(width)];
};

/**
 * A problem with the pattern itself. These are reported to the caller
 * as an err result by the non-throwing entry points.
 */
export class RegexSyntaxError extends Error {
  readonly code: RegexSyntaxErrorCode;
  readonly span: Span;
  private _message: string;
  private source?: string;

  constructor(code: RegexSyntaxErrorCode, span: Span, message: string) {
    super(message);
    this.name = 'RegexSyntaxError';
    this.code = code;
    this.span = span;
    this._message = message;
    this.message = this.getMessage();
  }

  getMessage() {
    const lines = [`RegexSyntaxError at ${atString(this.span)}: ${this._message}`];
    if (this.source !== undefined) {
      lines.push(...atSource(this.source, this.span).map((line) => `  ` + line));
    }
    return lines.join('\n');
  }

  attachSource(source: string) {
    this.source = source;
    this.message = this.getMessage();
  }
}

/**
 * Raised when one stage of the pipeline hands another stage something
 * it should never have produced, e.g. postfix input with a missing
 * operand reaching the NFA builder. Never used for bad patterns.
 */
export class ConstructionInvariantError extends Error {
  constructor(message: string) {
    super(`ConstructionInvariantError: ${message}`);
    this.name = 'ConstructionInvariantError';
  }
}
