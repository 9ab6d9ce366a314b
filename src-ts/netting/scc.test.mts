import { describe, expect, it } from 'vitest';
import { buildObligationGraph } from './graph.mts';
import type { Intent } from './intents.mts';
import { findStronglyConnectedComponents, indexObligationGraph } from './scc.mts';

const eth = (sender: string, receiver: string, amount: bigint): Intent => ({ sender, receiver, token: 'ETH', amount });

describe('findStronglyConnectedComponents', () => {
  it('returns a triangle as one component in pop order', () => {
    const graph = buildObligationGraph({
      intents: [eth('A', 'B', 1n), eth('B', 'C', 1n), eth('C', 'A', 1n)]
    });

    expect(findStronglyConnectedComponents(graph)).toEqual([['C', 'B', 'A']]);
  });

  it('finds nothing in an acyclic graph', () => {
    const graph = buildObligationGraph({
      intents: [eth('A', 'B', 1n), eth('B', 'C', 1n), eth('A', 'C', 1n)]
    });

    expect(findStronglyConnectedComponents(graph)).toEqual([]);
  });

  it('separates disjoint loops and drops single-vertex components', () => {
    const graph = buildObligationGraph({
      intents: [eth('A', 'B', 1n), eth('B', 'A', 1n), eth('B', 'X', 1n), eth('C', 'D', 1n), eth('D', 'C', 1n)]
    });

    const components = findStronglyConnectedComponents(graph).map(c => [...c].sort());
    expect(components).toEqual([['A', 'B'], ['C', 'D']]);
  });

  it('discards a lone self-loop', () => {
    const graph = buildObligationGraph({ intents: [eth('A', 'A', 3n)] });

    expect(findStronglyConnectedComponents(graph)).toEqual([]);
  });

  it('ignores zero-amount edges', () => {
    const graph = buildObligationGraph({ intents: [eth('A', 'B', 5n), eth('B', 'A', 0n)] });

    expect(findStronglyConnectedComponents(graph)).toEqual([]);
  });

  it('handles a long ring without recursion limits', () => {
    const size = 20000;
    const party = (i: number) => `p${String(i).padStart(5, '0')}`;
    const intents = Array.from({ length: size }, (_, i) => eth(party(i), party((i + 1) % size), 1n));
    const graph = buildObligationGraph({ intents });

    const components = findStronglyConnectedComponents(graph);
    expect(components).toHaveLength(1);
    expect(components[0]).toHaveLength(size);
  });
});

describe('indexObligationGraph', () => {
  it('collapses parallel edges into one successor', () => {
    const graph = buildObligationGraph({
      intents: [eth('A', 'B', 1n), { sender: 'A', receiver: 'B', token: 'USDC', amount: 2n }]
    });

    const index = indexObligationGraph(graph);
    expect(index.parties).toEqual(['A', 'B']);
    expect(index.successors).toEqual([[1], []]);
  });
});
