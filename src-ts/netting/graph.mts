import { addAmounts } from './amounts.mts';
import type { Intent, PartyId, TokenId } from './intents.mts';

export interface Edge {
  to: PartyId;
  token: TokenId;
  amount: bigint;
}

/**
 * Outgoing token-tagged debts per party. A run owns exactly one graph and threads it
 * through every stage; nothing else holds a reference to it.
 */
export interface ObligationGraph {
  edges: Map<PartyId, Edge[]>;
}

export function createObligationGraph(): ObligationGraph {
  return { edges: new Map() };
}

export function addEdge(graph: ObligationGraph, from: PartyId, to: PartyId, token: TokenId, amount: bigint): void {
  const list = graph.edges.get(from);
  if (!list) {
    graph.edges.set(from, [{ to, token, amount }]);
    return;
  }
  const existing = list.find(edge => edge.to === to && edge.token === token);
  if (existing) {
    existing.amount = addAmounts(existing.amount, amount);
    return;
  }
  list.push({ to, token, amount });
}

export function buildObligationGraph({ intents }: { intents: readonly Intent[] }): ObligationGraph {
  const graph = createObligationGraph();
  for (const intent of intents) {
    addEdge(graph, intent.sender, intent.receiver, intent.token, intent.amount);
  }
  return graph;
}

export function findEdge(graph: ObligationGraph, from: PartyId, to: PartyId, token: TokenId): Edge | null {
  return graph.edges.get(from)?.find(edge => edge.to === to && edge.token === token) ?? null;
}

export function partiesOf(graph: ObligationGraph): PartyId[] {
  const seen = new Set<PartyId>();
  for (const [from, list] of graph.edges) {
    seen.add(from);
    for (const edge of list) seen.add(edge.to);
  }
  return [...seen];
}

export function countEdges(graph: ObligationGraph): number {
  let total = 0;
  for (const list of graph.edges.values()) total += list.length;
  return total;
}

export function graphToIntents(graph: ObligationGraph): Intent[] {
  const intents: Intent[] = [];
  for (const [sender, list] of graph.edges) {
    for (const edge of list) {
      if (edge.amount <= 0n) continue;
      intents.push({ sender, receiver: edge.to, token: edge.token, amount: edge.amount });
    }
  }
  return intents;
}
