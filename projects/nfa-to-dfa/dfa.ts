import { ConstructionInvariantError } from '../regex-compiler/errors.js';
import { Table } from '../utils/data-structures/table.js';
import { type IHaveDebugStr, log } from '../utils/debug.js';
import type { ConstStateSet, StateSet } from '../utils/sets.js';
import { closure, move, NFA } from './nfa.js';

export interface DFAState {
  readonly id: number;
  readonly accepting: boolean;
  /**
   * the NFA states this DFA state stands for
   */
  readonly nfaStates: ConstStateSet;
  readonly transitions: ReadonlyMap<string, number>;
}

type MutDFAState = DFAState & { transitions: Map<string, number> };

export interface DFAJSON {
  start: number;
  alphabet: string[];
  states: {
    id: number;
    accepting: boolean;
    nfaStates: number[];
    transitions: { [symbol: string]: number };
  }[];
}

/**
 * Convert an NFA to a DFA with the subset construction.
 * See page 47 of Engineering a Compiler (Cooper & Torczon).
 *
 * @param nfa Source NFA from which to generate the DFA
 * @param alphabet symbols to explore from each state
 * @returns a new DFA whose state 0 is the start state
 */
function toDFA(nfa: NFA, alphabet: Iterable<string>): DFA {
  const dfa = new DFA(alphabet);
  const { graph } = nfa;
  // 2^n is the most distinct subsets of n NFA states there can be
  const maxStates = 2 ** nfa.numStates;

  // Map from the key of an NFA configuration to the DFA state
  // representing it.
  const configurations: Map<string, number> = new Map();
  // DFA states whose outgoing transitions have not been explored yet.
  const toVisit: number[] = [];

  const getOrCreateState = (nfaStates: StateSet): number => {
    const key = nfaStates.key();
    let state = configurations.get(key);
    if (state === undefined) {
      if (dfa.numStates >= maxStates) {
        throw new ConstructionInvariantError(
          `DFA has more states than the ${maxStates} subsets of ${nfa.numStates} NFA states`
        );
      }
      state = dfa.addState(nfaStates, nfaStates.has(nfa.accept));
      configurations.set(key, state);
      toVisit.push(state);
      log(`toDFA: s${state} = ${nfaStates.toDebugStr()}`);
    }
    return state;
  };

  // The first configuration includes the states that we get to by consuming
  // 0 characters from the start state.
  getOrCreateState(closure(graph, [nfa.start]));

  for (
    let current = toVisit.pop();
    current !== undefined;
    current = toVisit.pop()
  ) {
    const { nfaStates } = dfa.getState(current);
    for (const symbol of dfa.getAlphabet()) {
      const next = closure(graph, move(graph, nfaStates, symbol));
      if (next.isEmpty()) {
        // no edge: the input is rejected on this symbol
        continue;
      }
      dfa.addEdge(current, getOrCreateState(next), symbol);
    }
  }
  return dfa;
}

export class DFA implements IHaveDebugStr {
  static readonly START_STATE = 0;

  static fromNFA(nfa: NFA, alphabet: Iterable<string>): DFA {
    return toDFA(nfa, alphabet);
  }

  private readonly states: MutDFAState[] = [];
  private readonly alphabet: string[];

  constructor(alphabet: Iterable<string>) {
    this.alphabet = [...new Set(alphabet)];
  }

  get numStates() {
    return this.states.length;
  }

  getStartState() {
    return DFA.START_STATE;
  }

  getAlphabet(): readonly string[] {
    return this.alphabet;
  }

  getStates(): readonly DFAState[] {
    return this.states;
  }

  getState(state: number): DFAState {
    return this.getMutState(state);
  }

  /**
   * The set is frozen once it belongs to a state.
   */
  addState(nfaStates: StateSet, accepting: boolean): number {
    const id = this.states.length;
    this.states.push({
      id,
      accepting,
      nfaStates: nfaStates.freeze(),
      transitions: new Map(),
    });
    return id;
  }

  addEdge(fromState: number, toState: number, symbol: string) {
    this.getState(toState);
    const { transitions } = this.getMutState(fromState);
    const existing = transitions.get(symbol);
    if (existing !== undefined) {
      throw new ConstructionInvariantError(
        `There is already an edge from s${fromState} to s${existing} via ${symbol}`
      );
    }
    transitions.set(symbol, toState);
  }

  isAcceptingState(state: number): boolean {
    return this.getState(state).accepting;
  }

  getNextState(fromState: number, symbol: string): number | null {
    return this.getState(fromState).transitions.get(symbol) ?? null;
  }

  /**
   * Follow the transitions for each symbol of the input from the start
   * state.
   *
   * @returns the state reached once the input is exhausted, or null if
   * some symbol had no transition
   */
  run(input: Iterable<string>): number | null {
    if (this.numStates == 0) {
      return null;
    }
    let currentState = this.getStartState();
    for (const symbol of input) {
      const nextState = this.getNextState(currentState, symbol);
      if (nextState === null) {
        return null;
      }
      currentState = nextState;
    }
    return currentState;
  }

  accepts(input: Iterable<string>): boolean {
    const finalState = this.run(input);
    return finalState !== null && this.isAcceptingState(finalState);
  }

  private getMutState(state: number): MutDFAState {
    const found = this.states[state];
    if (found === undefined) {
      throw new ConstructionInvariantError(
        `state ${state} is not valid. Must be < ${this.states.length}`
      );
    }
    return found;
  }

  private stateLabel(state: number) {
    let out = 's' + state;
    if (this.isAcceptingState(state)) {
      out = '*' + out;
    }
    if (state == this.getStartState()) {
      out = '>' + out;
    }
    return out;
  }

  toDebugStr(): string {
    const table = Table.init(1 + this.numStates, 1 + this.alphabet.length, () => '');
    table.setCell(0, 0, 'δ');
    for (let ai = 0; ai < this.alphabet.length; ai++) {
      table.setCell(0, ai + 1, this.alphabet[ai]);
    }
    for (let si = 0; si < this.numStates; si++) {
      table.setCell(si + 1, 0, this.stateLabel(si) + ':');
      for (let ai = 0; ai < this.alphabet.length; ai++) {
        const nextState = this.getNextState(si, this.alphabet[ai]);
        table.setCell(si + 1, ai + 1, nextState === null ? '_' : this.stateLabel(nextState));
      }
    }

    let out = table.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to NFA states:\n';
    for (const state of this.states) {
      out += `s${state.id}: ${state.nfaStates.toDebugStr()}\n`;
    }
    return out;
  }

  toJSON(): DFAJSON {
    return {
      start: this.getStartState(),
      alphabet: [...this.alphabet],
      states: this.states.map((state) => ({
        id: state.id,
        accepting: state.accepting,
        nfaStates: [...state.nfaStates],
        transitions: Object.fromEntries(state.transitions),
      })),
    };
  }
}
