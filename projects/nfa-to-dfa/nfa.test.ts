import { ConstructionInvariantError } from '../regex-compiler/errors.js';
import { closure, move, NFA, NFAGraph } from './nfa.js';

describe('NFAGraph', () => {
  test('addState() hands out consecutive indices', () => {
    const graph = new NFAGraph();
    expect([graph.addState(), graph.addState(), graph.addState()]).toEqual([
      0, 1, 2,
    ]);
    expect(graph.numStates).toBe(3);
  });

  test('a symbol can lead to several states', () => {
    const graph = new NFAGraph();
    const [s0, s1, s2] = [graph.addState(), graph.addState(), graph.addState()];
    graph.addEdge(s0, 'a', s1);
    graph.addEdge(s0, 'a', s2);
    graph.addEdge(s1, 'b', s2);
    graph.addEpsilon(s2, s0);
    expect(graph.getNextStates(s0, 'a')).toEqual([1, 2]);
    expect(graph.getNextStates(s1, 'a')).toEqual([]);
    expect(graph.getEpsilonStates(s2)).toEqual([0]);
    expect(graph.getAlphabet()).toEqual(['a', 'b']);
    expect(graph.getNode(s0).edges.get('a')).toEqual([1, 2]);
  });

  test('rejects unknown states', () => {
    const graph = new NFAGraph();
    const s0 = graph.addState();
    expect(() => graph.addEdge(s0, 'a', 1)).toThrow(ConstructionInvariantError);
    expect(() => graph.addEpsilon(3, s0)).toThrow(
      'ConstructionInvariantError: fromState 3 is not valid. Must be < 1'
    );
    expect(() => graph.getNode(-1)).toThrow(ConstructionInvariantError);
  });
});

describe('NFA', () => {
  test('toDebugStr()', () => {
    const graph = new NFAGraph();
    const s0 = graph.addState();
    const s1 = graph.addState();
    graph.addEdge(s0, 'a', s1);
    const nfa = new NFA(graph, s0, s1);
    expect('\n' + nfa.toDebugStr()).toBe(
      ['', '     δ    a  ϵ', '  >s0:  *s1  _', '  *s1:    _  _', ''].join('\n')
    );
  });

  test('describe() lists reachable states depth first', () => {
    // a*
    const graph = new NFAGraph();
    const [s0, s1, s2, s3] = [
      graph.addState(),
      graph.addState(),
      graph.addState(),
      graph.addState(),
    ];
    graph.addEdge(s0, 'a', s1);
    graph.addEpsilon(s2, s0);
    graph.addEpsilon(s2, s3);
    graph.addEpsilon(s1, s0);
    graph.addEpsilon(s1, s3);
    const nfa = new NFA(graph, s2, s3);
    expect(nfa.describe()).toBe(
      [
        '>s2: ϵ -> s0,s3',
        's0: a -> s1',
        's1: ϵ -> s0,s3',
        '*s3:',
      ].join('\n')
    );
  });

  test('describe() skips unreachable states', () => {
    const graph = new NFAGraph();
    const s0 = graph.addState();
    graph.addState();
    const s2 = graph.addState();
    graph.addEdge(s0, 'x', s2);
    expect(new NFA(graph, s0, s2).describe()).toBe('>s0: x -> s2\n*s2:');
  });
});

describe('traversal functions', () => {
  let graph: NFAGraph;
  let s0: number, s1: number, s2: number, s3: number, s4: number;

  beforeAll(() => {
    graph = new NFAGraph();
    s0 = graph.addState();
    s1 = graph.addState();
    s2 = graph.addState();
    s3 = graph.addState();
    s4 = graph.addState();

    const edges: [number, string, number][] = [
      [s1, 'a', s4],
      [s1, 'b', s3],
      [s2, 'c', s4],
      [s2, 'a', s4],
      [s3, 'b', s4],
    ];
    edges.forEach(([from, symbol, to]) => graph.addEdge(from, symbol, to));
    const epsilons: [number, number][] = [
      [s0, s1],
      [s0, s2],
      [s2, s3],
      [s3, s2],
    ];
    epsilons.forEach(([from, to]) => graph.addEpsilon(from, to));
  });

  test('closure(s)', () => {
    expect([...closure(graph, [s1])]).toEqual([1]);
    expect([...closure(graph, [s3])]).toEqual([2, 3]);
    expect([...closure(graph, [s4])]).toEqual([4]);
    expect([...closure(graph, [s0])]).toEqual([0, 1, 2, 3]);
    expect([...closure(graph, [s1, s4])]).toEqual([1, 4]);
    expect([...closure(graph, [s1, s3])]).toEqual([1, 2, 3]);
    expect([...closure(graph, [])]).toEqual([]);
  });

  test('move(s, a)', () => {
    expect([...move(graph, [s1, s2], 'c')]).toEqual([4]);
    expect([...move(graph, [s1, s3], 'b')]).toEqual([3, 4]);
    expect([...move(graph, [s0], 'a')]).toEqual([]);
    expect([...move(graph, [s2], 'z')]).toEqual([]);
  });

  test('results are sized to the graph', () => {
    expect(closure(graph, [s0]).capacity).toBe(5);
    expect(move(graph, [s1], 'a').capacity).toBe(5);
  });
});
