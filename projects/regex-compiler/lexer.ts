import { err, ok, Result } from 'neverthrow';
import { RegexSyntaxError } from './errors.js';
import { LexToken } from './LexToken.js';

export enum Token {
  LITERAL = 'LITERAL',
  GROUP_OPEN = 'GROUP_OPEN',
  GROUP_CLOSE = 'GROUP_CLOSE',
  UNION = 'UNION',
  STAR = 'STAR',
  CONCAT = 'CONCAT',
}

export type Lexeme = LexToken<Token>;

const LITERAL_PATTERN = /^[\p{L}\p{N}]$/u;

const OPERATORS: ReadonlyMap<string, Token> = new Map([
  ['(', Token.GROUP_OPEN],
  [')', Token.GROUP_CLOSE],
  ['|', Token.UNION],
  ['*', Token.STAR],
]);

export function isLiteral(char: string): boolean {
  return LITERAL_PATTERN.test(char);
}

/**
 * Splits a pattern into one token per character. CONCAT tokens are
 * never produced here; the postfix converter inserts them.
 */
export class Lexer implements Iterator<Lexeme, undefined> {
  private chars: Iterator<string>;
  private pos: number = 0;

  constructor(input: string) {
    this.chars = input[Symbol.iterator]();
  }

  next(): IteratorResult<Lexeme, undefined> {
    const { value: char, done } = this.chars.next();
    if (done) {
      return { value: undefined, done: true };
    }
    const span = { from: this.pos, to: this.pos + char.length };
    this.pos = span.to;

    if (isLiteral(char)) {
      return { value: new LexToken(Token.LITERAL, span, char), done: false };
    }
    const operator = OPERATORS.get(char);
    if (operator !== undefined) {
      return { value: new LexToken(operator, span, char), done: false };
    }
    throw new RegexSyntaxError(
      'UNSUPPORTED_SYMBOL',
      span,
      `Unsupported symbol ${JSON.stringify(char)}`
    );
  }

  [Symbol.iterator]() {
    return this;
  }
}

export function tokenizeOrThrow(input: string): Lexeme[] {
  return [...new Lexer(input)];
}

export function tokenize(input: string): Result<Lexeme[], RegexSyntaxError> {
  try {
    return ok(tokenizeOrThrow(input));
  } catch (e) {
    if (e instanceof RegexSyntaxError) {
      return err(e);
    }
    throw e;
  }
}
