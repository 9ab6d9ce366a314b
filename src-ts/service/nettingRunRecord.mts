import crypto from 'node:crypto';
import type { NettingError } from '../netting/errors.mts';
import { serializeIntent, type Intent, type TokenId } from '../netting/intents.mts';
import type { NettingConfig } from './nettingConfig.mts';
import type { TimedNettingResult } from './nettingRunner.mts';

export interface TokenVolume {
  input: string;
  residual: string;
  cancelled: string;
}

export function nettingBatchId(intents: readonly Intent[]): string {
  const h = crypto.createHash('sha256');
  for (const intent of intents) {
    h.update(JSON.stringify(serializeIntent(intent)));
    h.update('\n');
  }
  return `netting_${h.digest('hex').slice(0, 12)}`;
}

function volumeByToken(intents: readonly Intent[]): Map<TokenId, bigint> {
  const totals = new Map<TokenId, bigint>();
  for (const intent of intents) {
    totals.set(intent.token, (totals.get(intent.token) ?? 0n) + intent.amount);
  }
  return totals;
}

export function summarizeTokenVolumes({
  before,
  after
}: {
  before: readonly Intent[];
  after: readonly Intent[];
}): Record<TokenId, TokenVolume> {
  const input = volumeByToken(before);
  const residual = volumeByToken(after);
  const tokens = [...input.keys()].sort();
  const summary: Record<TokenId, TokenVolume> = {};
  for (const token of tokens) {
    const a = input.get(token) ?? 0n;
    const b = residual.get(token) ?? 0n;
    summary[token] = {
      input: a.toString(),
      residual: b.toString(),
      cancelled: (a - b).toString()
    };
  }
  return summary;
}

function cycleBounds(config: NettingConfig) {
  return {
    max_cycle_length: config.max_cycle_length,
    dedupe_rotations: config.dedupe_rotations
  };
}

function safetyLimits(config: NettingConfig) {
  return {
    max_cycles_explored: config.max_cycles_explored,
    timeout_ms: config.timeout_ms,
    allow_partial: config.allow_partial
  };
}

export function buildNettingRunRecord({
  batchId,
  recordedAt,
  config,
  inputIntents,
  result
}: {
  batchId: string;
  recordedAt: string;
  config: NettingConfig;
  inputIntents: readonly Intent[];
  result: TimedNettingResult;
}) {
  const { netting } = result;
  return {
    batch_id: batchId,
    recorded_at: recordedAt,
    cycle_bounds: cycleBounds(config),
    safety_limits: safetyLimits(config),
    runtime_ms: result.runtime_ms,
    stats: netting.stats,
    volume_by_token: summarizeTokenVolumes({ before: inputIntents, after: netting.intents }),
    residual_intents: netting.intents.map(serializeIntent),
    ...(netting.trace ? { trace: netting.trace } : {})
  };
}

export function buildNettingErrorRecord({
  batchId,
  recordedAt,
  config,
  error
}: {
  batchId: string | null;
  recordedAt: string;
  config: NettingConfig | null;
  error: NettingError;
}) {
  return {
    batch_id: batchId,
    recorded_at: recordedAt,
    netting_error: {
      code: error.code,
      name: error.name,
      message: error.message,
      details: error.details ?? null
    },
    cycle_bounds: config ? cycleBounds(config) : null,
    safety_limits: config ? safetyLimits(config) : null
  };
}
