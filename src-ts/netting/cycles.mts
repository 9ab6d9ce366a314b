import type { ObligationGraph } from './graph.mts';
import type { PartyId } from './intents.mts';
import { indexObligationGraph, type VertexIndex } from './scc.mts';

export type Cycle = PartyId[];

/**
 * Run-wide cap on cycle enumeration. Shared by every component of one netting run and
 * checked on each DFS step.
 */
export interface ExplorationBudget {
  maxEnumeratedCycles: number | null;
  deadlineMs: number | null;
  now: () => number;
  enumerated: number;
  limited: boolean;
  timedOut: boolean;
}

export function createExplorationBudget({
  maxEnumeratedCycles = null,
  timeoutMs = null,
  now = Date.now
}: {
  maxEnumeratedCycles?: number | null;
  timeoutMs?: number | null;
  now?: () => number;
} = {}): ExplorationBudget {
  return {
    maxEnumeratedCycles,
    deadlineMs: timeoutMs === null ? null : now() + timeoutMs,
    now,
    enumerated: 0,
    limited: false,
    timedOut: false
  };
}

export function budgetExhausted(budget: ExplorationBudget): boolean {
  return budget.limited || budget.timedOut;
}

export function canonicalCycle(cycle: readonly PartyId[]): Cycle {
  if (cycle.length === 0) return [];
  let idx = 0;
  for (let i = 1; i < cycle.length; i += 1) {
    if (cycle[i] < cycle[idx]) idx = i;
  }
  return [...cycle.slice(idx), ...cycle.slice(0, idx)];
}

export function cycleKey(cycle: readonly PartyId[]): string {
  return JSON.stringify(cycle);
}

interface SearchFrame {
  v: number;
  next: number;
}

export function findBoundedSimpleCycles({
  graph,
  component,
  maxCycleLength = 4,
  budget = createExplorationBudget(),
  dedupeRotations = true,
  index = indexObligationGraph(graph)
}: {
  graph: ObligationGraph;
  component: readonly PartyId[];
  maxCycleLength?: number;
  budget?: ExplorationBudget;
  dedupeRotations?: boolean;
  index?: VertexIndex;
}): Cycle[] {
  const { parties, handleOf, successors } = index;
  const members = new Set<number>();
  for (const party of component) {
    const handle = handleOf.get(party);
    if (handle !== undefined) members.add(handle);
  }

  const cycles: Cycle[] = [];
  const seen = new Set<string>();
  const visited = new Array<boolean>(parties.length).fill(false);

  const record = (path: readonly number[]): boolean => {
    if (budget.maxEnumeratedCycles !== null && budget.enumerated >= budget.maxEnumeratedCycles) {
      budget.limited = true;
      return false;
    }
    budget.enumerated += 1;
    const vertices = path.map(h => parties[h]);
    if (!dedupeRotations) {
      cycles.push(vertices);
      return true;
    }
    const canonical = canonicalCycle(vertices);
    const key = cycleKey(canonical);
    if (!seen.has(key)) {
      seen.add(key);
      cycles.push(canonical);
    }
    return true;
  };

  const deadlinePassed = (): boolean => {
    if (budget.deadlineMs === null) return false;
    if (budget.now() <= budget.deadlineMs) return false;
    budget.timedOut = true;
    return true;
  };

  for (const startParty of component) {
    if (budgetExhausted(budget)) break;
    const start = handleOf.get(startParty);
    if (start === undefined) continue;

    const path: number[] = [start];
    const work: SearchFrame[] = [{ v: start, next: 0 }];
    visited[start] = true;

    while (work.length > 0) {
      if (deadlinePassed()) break;
      const frame = work[work.length - 1];
      const out = successors[frame.v];

      if (frame.next >= out.length) {
        work.pop();
        path.pop();
        visited[frame.v] = false;
        continue;
      }

      const w = out[frame.next];
      frame.next += 1;

      if (w === start) {
        if (!record(path)) break;
        continue;
      }
      if (visited[w] || !members.has(w) || path.length >= maxCycleLength) continue;

      visited[w] = true;
      path.push(w);
      work.push({ v: w, next: 0 });
    }

    for (const v of path) visited[v] = false;
  }

  return cycles;
}
