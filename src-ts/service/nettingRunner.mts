import { runNetting, type NettingResult } from '../netting/engine.mts';
import type { Intent } from '../netting/intents.mts';
import { nettingOptionsFromConfig, type NettingConfig } from './nettingConfig.mts';

export interface TimedNettingResult {
  netting: NettingResult;
  runtime_ms: number;
}

export function runNettingWithConfig({
  intents,
  config,
  now
}: {
  intents: readonly Intent[];
  config: NettingConfig;
  now?: () => number;
}): TimedNettingResult {
  const startedAtNs = process.hrtime.bigint();
  const netting = runNetting({ ...nettingOptionsFromConfig(config), intents, now });
  const runtimeMs = Number((process.hrtime.bigint() - startedAtNs) / 1000000n);

  return {
    netting,
    runtime_ms: runtimeMs
  };
}
