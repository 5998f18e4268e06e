import { Result } from 'neverthrow';
import { DFA } from '../nfa-to-dfa/dfa.js';
import type { NFA } from '../nfa-to-dfa/nfa.js';
import { buildNFA } from '../nfa-to-dfa/regex-nfa.js';
import { extractAlphabet } from './alphabet.js';
import { RegexSyntaxError } from './errors.js';
import { type Lexeme, tokenize } from './lexer.js';
import { toPostfix } from './postfix.js';

/**
 * Every intermediate product of compiling a pattern.
 */
export interface CompiledRegex {
  source: string;
  tokens: Lexeme[];
  alphabet: Set<string>;
  postfix: Lexeme[];
  nfa: NFA;
  dfa: DFA;
}

/**
 * Compile a pattern all the way to a DFA.
 *
 * Problems with the pattern come back as an err result with the source
 * attached to the error. A ConstructionInvariantError is thrown rather
 * than returned, since it means the pipeline itself is broken.
 */
export function compileRegex(
  source: string
): Result<CompiledRegex, RegexSyntaxError> {
  return tokenize(source)
    .andThen((tokens) =>
      toPostfix(tokens).map((postfix) => {
        const alphabet = extractAlphabet(tokens);
        const nfa = buildNFA(postfix);
        const dfa = DFA.fromNFA(nfa, alphabet);
        return { source, tokens, alphabet, postfix, nfa, dfa };
      })
    )
    .mapErr((e) => {
      e.attachSource(source);
      return e;
    });
}

export function compileRegexOrThrow(source: string): CompiledRegex {
  const result = compileRegex(source);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

export class Regex {
  pattern: string;
  private dfa: DFA;
  constructor(pattern: string) {
    this.pattern = pattern;
    this.dfa = compileRegexOrThrow(pattern).dfa;
  }
  /**
   * Whether the whole input matches the pattern.
   */
  test(input: string): boolean {
    return this.dfa.accepts(input);
  }
}
