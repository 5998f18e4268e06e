/**
 * This file implements the McNaughton-Yamada-Thompson algorithm
 * for converting regular expressions to NFAs. You can find a
 * description in Section 3.7.4 of the dragon book (p. 159):
 * "Construction of an NFA from a Regular Expression".
 *
 * The input is a pattern already in postfix order with explicit
 * concatenation tokens (see regex-compiler/postfix.ts).
 */

import { ConstructionInvariantError } from '../regex-compiler/errors.js';
import { type Lexeme, Token } from '../regex-compiler/lexer.js';
import { log } from '../utils/debug.js';
import { NFA, NFAGraph } from './nfa.js';

/**
 * A partially built NFA. Every fragment has exactly one start state
 * and one accepting state, both living in the builder's graph.
 */
export type Fragment = { start: number; accept: number };

export class RegexNFABuilder {
  private readonly graph = new NFAGraph();
  private readonly fragments: Fragment[] = [];

  static build(postfix: Iterable<Lexeme>): NFA {
    const builder = new RegexNFABuilder();
    for (const token of postfix) {
      builder.push(token);
    }
    return builder.finish();
  }

  push(token: Lexeme) {
    switch (token.token) {
      case Token.LITERAL:
        this.fragments.push(this.char(token.substr));
        break;
      case Token.CONCAT: {
        const right = this.pop(token);
        const left = this.pop(token);
        this.fragments.push(this.concat(left, right));
        break;
      }
      case Token.UNION: {
        const right = this.pop(token);
        const left = this.pop(token);
        this.fragments.push(this.or(left, right));
        break;
      }
      case Token.STAR:
        this.fragments.push(this.star(this.pop(token)));
        break;
      case Token.GROUP_OPEN:
      case Token.GROUP_CLOSE:
        throw new ConstructionInvariantError(
          `${token.token} at ${token.span.from} should not appear in postfix input`
        );
    }
  }

  finish(): NFA {
    if (this.fragments.length != 1) {
      throw new ConstructionInvariantError(
        `Expected exactly one fragment after the last token, found ${this.fragments.length}`
      );
    }
    const { start, accept } = this.fragments[0];
    log(`buildNFA: ${this.graph.numStates} states, start s${start}, accept s${accept}`);
    return new NFA(this.graph, start, accept);
  }

  private pop(token: Lexeme): Fragment {
    const fragment = this.fragments.pop();
    if (fragment === undefined) {
      throw new ConstructionInvariantError(
        `${token.token} at ${token.span.from} is missing an operand`
      );
    }
    return fragment;
  }

  char(symbol: string): Fragment {
    const start = this.graph.addState();
    const accept = this.graph.addState();
    this.graph.addEdge(start, symbol, accept);
    return { start, accept };
  }

  concat(left: Fragment, right: Fragment): Fragment {
    // the old accepting state of left just becomes an inner state
    this.graph.addEpsilon(left.accept, right.start);
    return { start: left.start, accept: right.accept };
  }

  or(left: Fragment, right: Fragment): Fragment {
    // new start state that branches into both alternatives via epsilon
    const start = this.graph.addState();
    this.graph.addEpsilon(start, left.start);
    this.graph.addEpsilon(start, right.start);

    // new accepting state that both alternatives lead to via epsilon
    const accept = this.graph.addState();
    this.graph.addEpsilon(left.accept, accept);
    this.graph.addEpsilon(right.accept, accept);
    return { start, accept };
  }

  star(child: Fragment): Fragment {
    const start = this.graph.addState();
    const accept = this.graph.addState();

    // enter the loop, or skip it for zero repetitions
    this.graph.addEpsilon(start, child.start);
    this.graph.addEpsilon(start, accept);

    // repeat, or leave the loop
    this.graph.addEpsilon(child.accept, child.start);
    this.graph.addEpsilon(child.accept, accept);
    return { start, accept };
  }
}

export const buildNFA = RegexNFABuilder.build;
