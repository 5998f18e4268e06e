/**
 * Shunting-yard conversion of an infix pattern into postfix order,
 * making concatenation explicit along the way.
 *
 * `ab*|c` becomes `a b * . c |`.
 */
import { err, ok, Result } from 'neverthrow';
import { RegexSyntaxError } from './errors.js';
import { type Lexeme, Lexer, Token } from './lexer.js';
import { LexToken } from './LexToken.js';

type Operator = Token.STAR | Token.CONCAT | Token.UNION;

const PRECEDENCE: { [op in Operator]: number } = {
  [Token.STAR]: 3,
  [Token.CONCAT]: 2,
  [Token.UNION]: 1,
};

function precedence(token: Lexeme): number {
  switch (token.token) {
    case Token.STAR:
    case Token.CONCAT:
    case Token.UNION:
      return PRECEDENCE[token.token];
    default:
      // GROUP_OPEN is a barrier, nothing drains past it
      return 0;
  }
}

export class PostfixConverter {
  private tokens: Iterator<Lexeme>;
  private output: Lexeme[] = [];
  private stack: Lexeme[] = [];
  // true at the start, and after ( or |
  private expectOperand = true;
  private last: Lexeme | null = null;

  private constructor(input: string | Iterable<Lexeme>) {
    if (typeof input == 'string') {
      this.tokens = new Lexer(input);
    } else {
      this.tokens = input[Symbol.iterator]();
    }
  }

  static convertOrThrow(input: string | Iterable<Lexeme>): Lexeme[] {
    return new PostfixConverter(input).convert();
  }

  static convertResult(
    input: string | Iterable<Lexeme>
  ): Result<Lexeme[], RegexSyntaxError> {
    try {
      return ok(new PostfixConverter(input).convert());
    } catch (e) {
      if (e instanceof RegexSyntaxError) {
        return err(e);
      }
      throw e;
    }
  }

  convert(): Lexeme[] {
    while (true) {
      const { value: token, done } = this.tokens.next();
      if (done) {
        break;
      }
      switch (token.token) {
        case Token.LITERAL:
          this.insertConcat(token);
          this.output.push(token);
          this.expectOperand = false;
          break;
        case Token.GROUP_OPEN:
          this.insertConcat(token);
          this.stack.push(token);
          this.expectOperand = true;
          break;
        case Token.GROUP_CLOSE:
          this.closeGroup(token);
          this.expectOperand = false;
          break;
        case Token.UNION:
          if (this.expectOperand) {
            throw danglingOperator(token, 'is missing its left operand');
          }
          this.pushOperator(token);
          this.expectOperand = true;
          break;
        case Token.STAR:
          if (this.expectOperand) {
            throw danglingOperator(token, 'has nothing to repeat');
          }
          // unary postfix with the highest precedence, so it can go
          // straight to the output
          this.output.push(token);
          break;
        case Token.CONCAT:
          throw new RegexSyntaxError(
            'UNSUPPORTED_SYMBOL',
            token.span,
            'Explicit concatenation tokens are not accepted as input'
          );
      }
      this.last = token;
    }
    return this.finish();
  }

  private insertConcat(before: Lexeme) {
    if (this.expectOperand) {
      return;
    }
    const at = before.span.from;
    this.pushOperator(new LexToken(Token.CONCAT, { from: at, to: at }, '.'));
  }

  private pushOperator(operator: Lexeme) {
    const prec = precedence(operator);
    while (this.stack.length > 0) {
      const top = this.stack[this.stack.length - 1];
      if (precedence(top) < prec) {
        break;
      }
      this.output.push(top);
      this.stack.pop();
    }
    this.stack.push(operator);
  }

  private closeGroup(close: Lexeme) {
    if (this.expectOperand && this.last !== null) {
      if (this.last.token == Token.GROUP_OPEN) {
        throw new RegexSyntaxError(
          'EMPTY_GROUP',
          { from: this.last.span.from, to: close.span.to },
          'Empty group ()'
        );
      }
      if (this.last.token == Token.UNION) {
        throw danglingOperator(this.last, 'is missing its right operand');
      }
    }
    while (true) {
      const top = this.stack.pop();
      if (top === undefined) {
        throw new RegexSyntaxError(
          'UNBALANCED_PARENTHESES',
          close.span,
          'Found ) without a matching ('
        );
      }
      if (top.token == Token.GROUP_OPEN) {
        return;
      }
      this.output.push(top);
    }
  }

  private finish(): Lexeme[] {
    if (this.expectOperand) {
      if (this.last === null) {
        throw new RegexSyntaxError(
          'EMPTY_EXPRESSION',
          { from: 0, to: 0 },
          "Can't convert an empty pattern"
        );
      }
      if (this.last.token == Token.UNION) {
        throw danglingOperator(this.last, 'is missing its right operand');
      }
    }
    for (
      let top = this.stack.pop();
      top !== undefined;
      top = this.stack.pop()
    ) {
      if (top.token == Token.GROUP_OPEN) {
        throw new RegexSyntaxError(
          'UNBALANCED_PARENTHESES',
          top.span,
          'Reached end of input before finding matching )'
        );
      }
      this.output.push(top);
    }
    return this.output;
  }
}

function danglingOperator(token: Lexeme, problem: string) {
  return new RegexSyntaxError(
    'DANGLING_OPERATOR',
    token.span,
    `Operator ${token.substr} ${problem}`
  );
}

export const toPostfix = PostfixConverter.convertResult;
export const toPostfixOrThrow = PostfixConverter.convertOrThrow;

/**
 * Render postfix tokens as a string, e.g. `ab.*`.
 */
export function postfixToString(postfix: Iterable<Lexeme>): string {
  let out = '';
  for (const token of postfix) {
    out += token.substr;
  }
  return out;
}
