import { readFileSync } from 'node:fs';
import {
  AmountOverflowError,
  ExplorationLimitError,
  InvalidIntentError,
  InvalidNettingConfigError
} from '../netting/errors.mts';
import { parseIntentsDocument } from '../netting/intents.mts';
import { readNettingConfigFromEnv, type NettingConfig } from './nettingConfig.mts';
import { runNettingWithConfig } from './nettingRunner.mts';
import { buildNettingErrorRecord, buildNettingRunRecord, nettingBatchId } from './nettingRunRecord.mts';

export type NettingCommandOutput =
  | ReturnType<typeof buildNettingRunRecord>
  | ReturnType<typeof buildNettingErrorRecord>;

export interface NettingCommandResult {
  exitCode: 0 | 1 | 2;
  output: NettingCommandOutput;
}

function readIntentsText(path: string, readFile: (path: string) => string): string {
  try {
    return readFile(path);
  } catch (error) {
    throw new InvalidIntentError({
      message: `Cannot read intents file ${path}`,
      details: { cause: error instanceof Error ? error.message : String(error) }
    });
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidIntentError({
      message: 'Intents file is not valid JSON',
      details: { cause: error instanceof Error ? error.message : String(error) }
    });
  }
}

export function netIntentsFile({
  path,
  env = process.env,
  readFile = p => readFileSync(p, 'utf8'),
  recordedAt = new Date().toISOString(),
  now
}: {
  path: string;
  env?: Record<string, string | undefined>;
  readFile?: (path: string) => string;
  recordedAt?: string;
  now?: () => number;
}): NettingCommandResult {
  let batchId: string | null = null;
  let config: NettingConfig | null = null;

  try {
    const intents = parseIntentsDocument(parseJson(readIntentsText(path, readFile)));
    batchId = nettingBatchId(intents);
    config = readNettingConfigFromEnv(env);
    const result = runNettingWithConfig({ intents, config, now });
    return {
      exitCode: 0,
      output: buildNettingRunRecord({ batchId, recordedAt, config, inputIntents: intents, result })
    };
  } catch (error) {
    if (error instanceof ExplorationLimitError) {
      return { exitCode: 2, output: buildNettingErrorRecord({ batchId, recordedAt, config, error }) };
    }
    if (
      error instanceof InvalidIntentError ||
      error instanceof InvalidNettingConfigError ||
      error instanceof AmountOverflowError
    ) {
      return { exitCode: 1, output: buildNettingErrorRecord({ batchId, recordedAt, config, error }) };
    }
    throw error;
  }
}
