export { U64_MAX, addAmounts, subtractAmount, isU64 } from './netting/amounts.mts';
export {
  NettingError,
  InvalidIntentError,
  InvalidNettingConfigError,
  AmountOverflowError,
  NettingInvariantError,
  ExplorationLimitError
} from './netting/errors.mts';
export type { NettingErrorCode, ExplorationLimitReason } from './netting/errors.mts';
export { parseIntentsDocument, serializeIntent, IntentSchema } from './netting/intents.mts';
export type { Intent, SerializedIntent, PartyId, TokenId } from './netting/intents.mts';
export {
  addEdge,
  buildObligationGraph,
  createObligationGraph,
  findEdge,
  graphToIntents,
  partiesOf
} from './netting/graph.mts';
export type { Edge, ObligationGraph } from './netting/graph.mts';
export { findStronglyConnectedComponents } from './netting/scc.mts';
export { canonicalCycle, createExplorationBudget, findBoundedSimpleCycles } from './netting/cycles.mts';
export type { Cycle, ExplorationBudget } from './netting/cycles.mts';
export { applyNetting, calculateNettingAmount, tokensOnCycle } from './netting/settlement.mts';
export { DEFAULT_MAX_CYCLE_LENGTH, processNetting, runNetting } from './netting/engine.mts';
export type {
  ExplorationLimitPolicy,
  NettingOptions,
  NettingResult,
  NettingStats,
  NettingTraceEntry
} from './netting/engine.mts';
export { readNettingConfigFromEnv } from './service/nettingConfig.mts';
export type { NettingConfig } from './service/nettingConfig.mts';
export { runNettingWithConfig } from './service/nettingRunner.mts';
export { buildNettingRunRecord, nettingBatchId, summarizeTokenVolumes } from './service/nettingRunRecord.mts';
export { netIntentsFile } from './service/nettingCommand.mts';
