import { minAmount, subtractAmount } from './amounts.mts';
import { NettingInvariantError } from './errors.mts';
import { findEdge, type Edge, type ObligationGraph } from './graph.mts';
import type { PartyId, TokenId } from './intents.mts';

function cyclePairs(cycle: readonly PartyId[]): Array<[PartyId, PartyId]> {
  return cycle.map((from, i): [PartyId, PartyId] => [from, cycle[(i + 1) % cycle.length]]);
}

export function tokensOnCycle(graph: ObligationGraph, cycle: readonly PartyId[]): TokenId[] {
  const tokens = new Set<TokenId>();
  for (const [from, to] of cyclePairs(cycle)) {
    for (const edge of graph.edges.get(from) ?? []) {
      if (edge.to === to && edge.amount > 0n) tokens.add(edge.token);
    }
  }
  return [...tokens];
}

/**
 * Largest amount of `token` that can be cancelled around `cycle`, or `null` when some
 * pair of the cycle carries no `token` edge at all.
 */
export function calculateNettingAmount(graph: ObligationGraph, cycle: readonly PartyId[], token: TokenId): bigint | null {
  if (cycle.length === 0) return null;
  let min: bigint | null = null;
  for (const [from, to] of cyclePairs(cycle)) {
    const edge = findEdge(graph, from, to, token);
    if (!edge) return null;
    min = min === null ? edge.amount : minAmount(min, edge.amount);
  }
  return min;
}

export function applyNetting(graph: ObligationGraph, cycle: readonly PartyId[], token: TokenId, amount: bigint): void {
  if (amount < 0n) {
    throw new NettingInvariantError(`Negative netting amount ${amount}`, { cycle: [...cycle], token });
  }

  const edges: Edge[] = [];
  for (const [from, to] of cyclePairs(cycle)) {
    const edge = findEdge(graph, from, to, token);
    if (!edge) {
      throw new NettingInvariantError(`No ${token} edge ${from} -> ${to} on netted cycle`, {
        cycle: [...cycle],
        token
      });
    }
    if (edge.amount < amount) {
      throw new NettingInvariantError(`Netting ${amount} ${token} exceeds edge ${from} -> ${to} (${edge.amount})`, {
        cycle: [...cycle],
        token,
        edge_amount: edge.amount.toString(),
        netting_amount: amount.toString()
      });
    }
    edges.push(edge);
  }

  for (const edge of edges) {
    edge.amount = subtractAmount(edge.amount, amount);
  }
}
