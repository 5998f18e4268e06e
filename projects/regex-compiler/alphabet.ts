import { type Lexeme, Lexer, Token } from './lexer.js';

/**
 * Collect the distinct literal symbols of a pattern, in order of first
 * appearance. Operators and parentheses are skipped.
 *
 * Given a string, unsupported characters throw a RegexSyntaxError the
 * same way the lexer does.
 */
export function extractAlphabet(input: string | Iterable<Lexeme>): Set<string> {
  const tokens = typeof input == 'string' ? new Lexer(input) : input;
  const alphabet: Set<string> = new Set();
  for (const token of tokens) {
    if (token.token == Token.LITERAL) {
      alphabet.add(token.substr);
    }
  }
  return alphabet;
}
