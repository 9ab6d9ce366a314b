import { budgetExhausted, createExplorationBudget, findBoundedSimpleCycles, type Cycle } from './cycles.mts';
import { ExplorationLimitError, InvalidNettingConfigError } from './errors.mts';
import { buildObligationGraph, countEdges, graphToIntents, partiesOf } from './graph.mts';
import { assertValidIntent, type Intent, type TokenId } from './intents.mts';
import { findStronglyConnectedComponents, indexObligationGraph } from './scc.mts';
import { applyNetting, calculateNettingAmount, tokensOnCycle } from './settlement.mts';

export const DEFAULT_MAX_CYCLE_LENGTH = 4;

export type ExplorationLimitPolicy = 'fail' | 'partial';

export interface NettingOptions {
  maxCycleLength?: number;
  maxEnumeratedCycles?: number | null;
  timeoutMs?: number | null;
  dedupeRotations?: boolean;
  onExplorationLimit?: ExplorationLimitPolicy;
  includeTrace?: boolean;
  now?: () => number;
}

export type NettingTraceReason = 'netted' | 'token_missing_on_cycle' | 'nothing_to_net';

export interface NettingTraceEntry {
  cycle: Cycle;
  token: TokenId;
  amount: string | null;
  reason: NettingTraceReason;
}

export interface NettingStats {
  intents_in: number;
  intents_out: number;
  parties: number;
  edges: number;
  components: number;
  candidate_cycles: number;
  netted_pairs: number;
  netted_by_token: Record<TokenId, string>;
  cycle_enumeration_limited: boolean;
  cycle_enumeration_timed_out: boolean;
}

export interface NettingResult {
  intents: Intent[];
  stats: NettingStats;
  trace: NettingTraceEntry[] | null;
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidNettingConfigError(`${name} must be a positive integer`, { [name]: value });
  }
}

export function runNetting({
  intents,
  maxCycleLength = DEFAULT_MAX_CYCLE_LENGTH,
  maxEnumeratedCycles = null,
  timeoutMs = null,
  dedupeRotations = true,
  onExplorationLimit = 'fail',
  includeTrace = false,
  now = Date.now
}: NettingOptions & { intents: readonly Intent[] }): NettingResult {
  assertPositiveInt('maxCycleLength', maxCycleLength);
  if (maxEnumeratedCycles !== null) assertPositiveInt('maxEnumeratedCycles', maxEnumeratedCycles);
  if (timeoutMs !== null) assertPositiveInt('timeoutMs', timeoutMs);
  intents.forEach(assertValidIntent);

  const graph = buildObligationGraph({ intents });
  const index = indexObligationGraph(graph);
  const components = findStronglyConnectedComponents(graph, index);
  const budget = createExplorationBudget({ maxEnumeratedCycles, timeoutMs, now });
  const trace: NettingTraceEntry[] | null = includeTrace ? [] : null;
  const nettedByToken = new Map<TokenId, bigint>();
  let candidateCycles = 0;
  let nettedPairs = 0;

  for (const component of components) {
    const cycles = findBoundedSimpleCycles({ graph, component, maxCycleLength, budget, dedupeRotations, index });
    if (budgetExhausted(budget) && onExplorationLimit === 'fail') {
      throw new ExplorationLimitError(budget.timedOut ? 'timeout' : 'max_cycles', {
        max_cycles_explored: maxEnumeratedCycles,
        timeout_ms: timeoutMs,
        cycles_enumerated: budget.enumerated
      });
    }
    candidateCycles += cycles.length;

    for (const cycle of cycles) {
      for (const token of tokensOnCycle(graph, cycle)) {
        const amount = calculateNettingAmount(graph, cycle, token);
        if (amount === null || amount === 0n) {
          trace?.push({
            cycle,
            token,
            amount: amount === null ? null : '0',
            reason: amount === null ? 'token_missing_on_cycle' : 'nothing_to_net'
          });
          continue;
        }
        applyNetting(graph, cycle, token, amount);
        nettedPairs += 1;
        nettedByToken.set(token, (nettedByToken.get(token) ?? 0n) + amount);
        trace?.push({ cycle, token, amount: amount.toString(), reason: 'netted' });
      }
    }

    if (budgetExhausted(budget)) break;
  }

  const residual = graphToIntents(graph);

  return {
    intents: residual,
    stats: {
      intents_in: intents.length,
      intents_out: residual.length,
      parties: partiesOf(graph).length,
      edges: countEdges(graph),
      components: components.length,
      candidate_cycles: candidateCycles,
      netted_pairs: nettedPairs,
      netted_by_token: Object.fromEntries([...nettedByToken].map(([token, amount]) => [token, amount.toString()])),
      cycle_enumeration_limited: budget.limited,
      cycle_enumeration_timed_out: budget.timedOut
    },
    trace
  };
}

export function processNetting(intents: readonly Intent[], options: NettingOptions = {}): Intent[] {
  return runNetting({ ...options, intents }).intents;
}
