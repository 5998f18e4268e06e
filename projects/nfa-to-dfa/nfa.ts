import { Table } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import { StateSet } from '../utils/sets.js';
import { ConstructionInvariantError } from '../regex-compiler/errors.js';

export interface NFANode {
  readonly index: number;
  /**
   * successor states for each symbol, in the order the edges were added
   */
  readonly edges: ReadonlyMap<string, readonly number[]>;
  /**
   * successor states reached without consuming a symbol
   */
  readonly epsilon: readonly number[];
}

export interface ConstNFAGraph {
  readonly numStates: number;
  getNode(state: number): NFANode;
  /**
   * Get all the states you can get to from the given state via
   * an edge labeled with the given symbol
   */
  getNextStates(state: number, symbol: string): readonly number[];
  getEpsilonStates(state: number): readonly number[];
  /**
   * Every symbol that labels at least one edge, in order of first use.
   */
  getAlphabet(): readonly string[];
}

type MutNFANode = {
  index: number;
  edges: Map<string, number[]>;
  epsilon: number[];
};

const NO_STATES: readonly number[] = [];

/**
 * Arena of NFA states addressed by index. The arena is also the
 * identifier allocator: every construction run gets its own graph, so
 * indices from two runs never interleave.
 */
export class NFAGraph implements ConstNFAGraph {
  private readonly nodes: MutNFANode[] = [];
  private readonly alphabet: string[] = [];

  get numStates() {
    return this.nodes.length;
  }

  /**
   * Adds a new state with no edges.
   *
   * @returns the index of the newly added state.
   */
  addState(): number {
    const index = this.nodes.length;
    this.nodes.push({ index, edges: new Map(), epsilon: [] });
    return index;
  }

  /**
   * Add an edge labeled with symbol between two states.
   */
  addEdge(fromState: number, symbol: string, toState: number) {
    const from = this.mutNode(fromState, 'fromState');
    this.mutNode(toState, 'toState');
    let targets = from.edges.get(symbol);
    if (targets === undefined) {
      targets = [];
      from.edges.set(symbol, targets);
    }
    targets.push(toState);
    if (this.alphabet.indexOf(symbol) == -1) {
      this.alphabet.push(symbol);
    }
  }

  /**
   * Add an edge that is followed without consuming a symbol.
   */
  addEpsilon(fromState: number, toState: number) {
    const from = this.mutNode(fromState, 'fromState');
    this.mutNode(toState, 'toState');
    from.epsilon.push(toState);
  }

  getNode(state: number): NFANode {
    return this.mutNode(state, 'state');
  }

  getNextStates(state: number, symbol: string): readonly number[] {
    return this.mutNode(state, 'state').edges.get(symbol) ?? NO_STATES;
  }

  getEpsilonStates(state: number): readonly number[] {
    return this.mutNode(state, 'state').epsilon;
  }

  getAlphabet(): readonly string[] {
    return this.alphabet;
  }

  private mutNode(state: number, name: string): MutNFANode {
    const node = this.nodes[state];
    if (node === undefined) {
      throw new ConstructionInvariantError(
        `${name} ${state} is not valid. Must be < ${this.nodes.length}`
      );
    }
    return node;
  }
}

/**
 * A graph together with its single start state and single accepting
 * state.
 */
export class NFA implements IHaveDebugStr {
  readonly graph: ConstNFAGraph;
  readonly start: number;
  readonly accept: number;

  constructor(graph: ConstNFAGraph, start: number, accept: number) {
    this.graph = graph;
    this.start = start;
    this.accept = accept;
  }

  get numStates() {
    return this.graph.numStates;
  }

  isAcceptingState(state: number) {
    return state == this.accept;
  }

  private stateLabel(state: number) {
    let out = 's' + state;
    if (this.isAcceptingState(state)) {
      out = '*' + out;
    }
    if (state == this.start) {
      out = '>' + out;
    }
    return out;
  }

  /**
   * One line per state reachable from the start state, in depth-first
   * order, e.g. `s0: a -> s1; ϵ -> s2`.
   */
  describe(): string {
    const visited: Set<number> = new Set();
    const toVisit = [this.start];
    const lines: string[] = [];
    for (
      let state = toVisit.pop();
      state !== undefined;
      state = toVisit.pop()
    ) {
      if (visited.has(state)) {
        continue;
      }
      visited.add(state);
      const node = this.graph.getNode(state);
      const parts: string[] = [];
      for (const [symbol, targets] of node.edges) {
        parts.push(`${symbol} -> ${targets.map((t) => 's' + t).join(',')}`);
        toVisit.push(...[...targets].reverse());
      }
      if (node.epsilon.length > 0) {
        parts.push(`ϵ -> ${node.epsilon.map((t) => 's' + t).join(',')}`);
        toVisit.push(...[...node.epsilon].reverse());
      }
      lines.push(`${this.stateLabel(state)}: ${parts.join('; ')}`.trimEnd());
    }
    return lines.join('\n');
  }

  toDebugStr(): string {
    const alphabet = this.graph.getAlphabet();
    const epsilonCol = alphabet.length + 1;
    const table = Table.init(1 + this.numStates, 2 + alphabet.length, () => '');
    table.setCell(0, 0, 'δ');
    for (let ai = 0; ai < alphabet.length; ai++) {
      table.setCell(0, ai + 1, alphabet[ai]);
    }
    table.setCell(0, epsilonCol, 'ϵ');

    const label = (states: readonly number[]) =>
      states.length == 0 ? '_' : states.map((s) => this.stateLabel(s)).join(',');

    for (let si = 0; si < this.numStates; si++) {
      table.setCell(si + 1, 0, this.stateLabel(si) + ':');
      for (let ai = 0; ai < alphabet.length; ai++) {
        table.setCell(si + 1, ai + 1, label(this.graph.getNextStates(si, alphabet[ai])));
      }
      table.setCell(si + 1, epsilonCol, label(this.graph.getEpsilonStates(si)));
    }
    return table.toDebugStr();
  }
}

/**
 * compute the epsilon closure of a set of states.
 *
 * @param startStates states to begin the traversal from
 * @returns the start states plus every state reachable from them by
 * only following epsilon edges
 */
export function closure(
  graph: ConstNFAGraph,
  startStates: Iterable<number>
): StateSet {
  const visited = new StateSet(graph.numStates);
  const toVisit: number[] = [];
  for (const state of startStates) {
    if (!visited.has(state)) {
      visited.add(state);
      toVisit.push(state);
    }
  }

  for (
    let current = toVisit.pop();
    current !== undefined;
    current = toVisit.pop()
  ) {
    for (const nextState of graph.getEpsilonStates(current)) {
      if (!visited.has(nextState)) {
        visited.add(nextState);
        toVisit.push(nextState);
      }
    }
  }
  return visited;
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on
 * input symbol a from some state s in T. Epsilon edges are not
 * followed.
 */
export function move(
  graph: ConstNFAGraph,
  startStates: Iterable<number>,
  symbol: string
): StateSet {
  const set = new StateSet(graph.numStates);
  for (const state of startStates) {
    for (const nextState of graph.getNextStates(state, symbol)) {
      set.add(nextState);
    }
  }
  return set;
}
