export { extractAlphabet } from './regex-compiler/alphabet.js';
export {
  ConstructionInvariantError,
  RegexSyntaxError,
  type RegexSyntaxErrorCode,
} from './regex-compiler/errors.js';
export {
  type Lexeme,
  Lexer,
  Token,
  tokenize,
  tokenizeOrThrow,
} from './regex-compiler/lexer.js';
export type { Span } from './regex-compiler/LexToken.js';
export {
  PostfixConverter,
  postfixToString,
  toPostfix,
  toPostfixOrThrow,
} from './regex-compiler/postfix.js';
export {
  compileRegex,
  compileRegexOrThrow,
  type CompiledRegex,
  Regex,
} from './regex-compiler/regex.js';
export { DFA, type DFAJSON, type DFAState } from './nfa-to-dfa/dfa.js';
export {
  closure,
  type ConstNFAGraph,
  move,
  NFA,
  NFAGraph,
  type NFANode,
} from './nfa-to-dfa/nfa.js';
export {
  buildNFA,
  type Fragment,
  RegexNFABuilder,
} from './nfa-to-dfa/regex-nfa.js';
export { type ConstStateSet, StateSet } from './utils/sets.js';
