import type { NettingOptions } from '../netting/engine.mts';

export interface NettingConfig {
  max_cycle_length: number;
  max_cycles_explored: number;
  timeout_ms: number;
  dedupe_rotations: boolean;
  allow_partial: boolean;
  include_trace: boolean;
}

type Env = Record<string, string | undefined>;

export function parseBooleanFlag(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value === '') return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function parseBoundedInt(
  value: string | undefined,
  { fallback, min, max }: { fallback: number; min: number; max: number }
): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

export function readNettingConfigFromEnv(env: Env = process.env): NettingConfig {
  return {
    max_cycle_length: parseBoundedInt(env.NETTING_MAX_CYCLE_LENGTH, {
      fallback: 4,
      min: 1,
      max: 8
    }),
    max_cycles_explored: parseBoundedInt(env.NETTING_MAX_CYCLES_EXPLORED, {
      fallback: 20000,
      min: 1,
      max: 200000
    }),
    timeout_ms: parseBoundedInt(env.NETTING_TIMEOUT_MS, {
      fallback: 1000,
      min: 1,
      max: 60000
    }),
    dedupe_rotations: parseBooleanFlag(env.NETTING_DEDUPE_ROTATIONS, true),
    allow_partial: parseBooleanFlag(env.NETTING_ALLOW_PARTIAL, false),
    include_trace: parseBooleanFlag(env.NETTING_INCLUDE_TRACE, false)
  };
}

export function nettingOptionsFromConfig(config: NettingConfig): NettingOptions {
  return {
    maxCycleLength: config.max_cycle_length,
    maxEnumeratedCycles: config.max_cycles_explored,
    timeoutMs: config.timeout_ms,
    dedupeRotations: config.dedupe_rotations,
    onExplorationLimit: config.allow_partial ? 'partial' : 'fail',
    includeTrace: config.include_trace
  };
}
