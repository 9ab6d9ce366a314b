import { describe, expect, it } from 'vitest';
import { canonicalCycle, createExplorationBudget, findBoundedSimpleCycles } from './cycles.mts';
import { buildObligationGraph } from './graph.mts';
import type { Intent } from './intents.mts';

const eth = (sender: string, receiver: string, amount = 1n): Intent => ({ sender, receiver, token: 'ETH', amount });

const triangle = buildObligationGraph({ intents: [eth('A', 'B'), eth('B', 'C'), eth('C', 'A')] });
const square = buildObligationGraph({ intents: [eth('A', 'B'), eth('B', 'C'), eth('C', 'D'), eth('D', 'A')] });

const k4Parties = ['A', 'B', 'C', 'D'];
const k4 = buildObligationGraph({
  intents: k4Parties.flatMap(from => k4Parties.filter(to => to !== from).map(to => eth(from, to)))
});

describe('canonicalCycle', () => {
  it('rotates to the smallest party', () => {
    expect(canonicalCycle(['C', 'A', 'B'])).toEqual(['A', 'B', 'C']);
    expect(canonicalCycle([])).toEqual([]);
  });
});

describe('findBoundedSimpleCycles', () => {
  it('reports one rotation per start when dedupe is off', () => {
    const cycles = findBoundedSimpleCycles({
      graph: triangle,
      component: ['A', 'B', 'C'],
      dedupeRotations: false
    });

    expect(cycles).toEqual([
      ['A', 'B', 'C'],
      ['B', 'C', 'A'],
      ['C', 'A', 'B']
    ]);
  });

  it('collapses rotations into the canonical cycle', () => {
    const cycles = findBoundedSimpleCycles({ graph: triangle, component: ['C', 'B', 'A'] });

    expect(cycles).toEqual([['A', 'B', 'C']]);
  });

  it('never returns a cycle longer than the bound', () => {
    expect(findBoundedSimpleCycles({ graph: square, component: k4Parties, maxCycleLength: 3 })).toEqual([]);
    expect(findBoundedSimpleCycles({ graph: square, component: k4Parties, maxCycleLength: 4 })).toEqual([
      ['A', 'B', 'C', 'D']
    ]);
  });

  it('enumerates every simple cycle of a complete digraph up to the bound', () => {
    const upTo3 = findBoundedSimpleCycles({ graph: k4, component: k4Parties, maxCycleLength: 3 });
    const upTo4 = findBoundedSimpleCycles({ graph: k4, component: k4Parties, maxCycleLength: 4 });

    expect(upTo3).toHaveLength(6 + 8);
    expect(upTo3.every(cycle => cycle.length <= 3)).toBe(true);
    expect(upTo4).toHaveLength(6 + 8 + 6);
  });

  it('stops once the cycle cap would be exceeded', () => {
    const budget = createExplorationBudget({ maxEnumeratedCycles: 5 });
    const cycles = findBoundedSimpleCycles({
      graph: k4,
      component: k4Parties,
      budget,
      dedupeRotations: false
    });

    expect(budget.limited).toBe(true);
    expect(budget.enumerated).toBe(5);
    expect(cycles).toHaveLength(5);
  });

  it('is not limited when the cap equals the cycles found', () => {
    const budget = createExplorationBudget({ maxEnumeratedCycles: 3 });
    findBoundedSimpleCycles({ graph: triangle, component: ['A', 'B', 'C'], budget });

    expect(budget.enumerated).toBe(3);
    expect(budget.limited).toBe(false);
  });

  it('stops when the deadline passes', () => {
    let t = 0;
    const budget = createExplorationBudget({ timeoutMs: 5, now: () => (t += 10) });
    const cycles = findBoundedSimpleCycles({ graph: k4, component: k4Parties, budget });

    expect(budget.timedOut).toBe(true);
    expect(cycles).toEqual([]);
  });
});
