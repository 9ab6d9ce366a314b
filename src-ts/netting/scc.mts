import type { ObligationGraph } from './graph.mts';
import type { PartyId } from './intents.mts';

/**
 * Integer handles for the parties of a graph, with the distinct successors of each
 * handle over positive-amount edges. Parallel edges (one per token) collapse into a
 * single successor.
 */
export interface VertexIndex {
  parties: PartyId[];
  handleOf: Map<PartyId, number>;
  successors: number[][];
}

export function indexObligationGraph(graph: ObligationGraph): VertexIndex {
  const parties: PartyId[] = [];
  const handleOf = new Map<PartyId, number>();
  const successors: number[][] = [];

  const intern = (party: PartyId): number => {
    const known = handleOf.get(party);
    if (known !== undefined) return known;
    const handle = parties.length;
    parties.push(party);
    handleOf.set(party, handle);
    successors.push([]);
    return handle;
  };

  for (const [from, list] of graph.edges) {
    const v = intern(from);
    for (const edge of list) {
      if (edge.amount <= 0n) continue;
      const w = intern(edge.to);
      if (!successors[v].includes(w)) successors[v].push(w);
    }
  }

  return { parties, handleOf, successors };
}

interface TarjanFrame {
  v: number;
  next: number;
}

export function findStronglyConnectedComponents(graph: ObligationGraph, index = indexObligationGraph(graph)): PartyId[][] {
  const { parties, handleOf, successors } = index;
  const n = parties.length;
  const discovery = new Array<number>(n).fill(-1);
  const lowlink = new Array<number>(n).fill(0);
  const onStack = new Array<boolean>(n).fill(false);
  const stack: number[] = [];
  const components: PartyId[][] = [];
  let counter = 0;

  const visit = (v: number, work: TarjanFrame[]) => {
    discovery[v] = counter;
    lowlink[v] = counter;
    counter += 1;
    stack.push(v);
    onStack[v] = true;
    work.push({ v, next: 0 });
  };

  for (const party of graph.edges.keys()) {
    const root = handleOf.get(party);
    if (root === undefined || discovery[root] !== -1) continue;

    const work: TarjanFrame[] = [];
    visit(root, work);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const out = successors[frame.v];

      if (frame.next < out.length) {
        const w = out[frame.next];
        frame.next += 1;
        if (discovery[w] === -1) {
          visit(w, work);
        } else if (onStack[w]) {
          lowlink[frame.v] = Math.min(lowlink[frame.v], discovery[w]);
        }
        continue;
      }

      work.pop();
      const v = frame.v;

      if (lowlink[v] === discovery[v]) {
        const component: PartyId[] = [];
        for (;;) {
          const w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          component.push(parties[w]);
          if (w === v) break;
        }
        if (component.length > 1) components.push(component);
      }

      const parent = work[work.length - 1];
      if (parent) lowlink[parent.v] = Math.min(lowlink[parent.v], lowlink[v]);
    }
  }

  return components;
}
