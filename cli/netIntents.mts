#!/usr/bin/env node
import { netIntentsFile } from '../src-ts/service/nettingCommand.mts';

const intentsPath = process.argv[2];
if (!intentsPath) {
  console.error('Usage: tsx cli/netIntents.mts <intents.json>');
  process.exit(1);
}

const { exitCode, output } = netIntentsFile({ path: intentsPath });

console.log(JSON.stringify(output, null, 2));
process.exit(exitCode);
