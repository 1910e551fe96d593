#!/usr/bin/env -S node --import tsx

import { readFile } from "node:fs/promises";

import { log, setupLogs } from './deps.ts';

import { parseControllerConfig } from "./defs/config.ts";
import { configureSource } from "./sources/_configure.ts";

import { createTickStream } from "./lib/ticks.ts";

import {
  mainLoopIteration,
} from "./logic.ts";

const args = process.argv.slice(2);
const configFlag = args.indexOf('--config');
const configPath = configFlag >= 0 ? args[configFlag + 1] ?? 'config.toml' : 'config.toml';

setupLogs({
  logLevel: args.includes('--debug') ? "debug" : "info",
  logFormat: args.includes('--log-as-json') ? "json" : "console",
});

const config = parseControllerConfig(await readFile(configPath, 'utf-8'));

log.debug(`Parsed configuration: ${JSON.stringify(config)}`);
log.info(`Configuration summary:
      ${config.source.length} sources: ${config.source.map(x => x.type).join(', ')}`);

const sources = config.source.map(configureSource);

// Main loop
for await (const tickSource of createTickStream(config, sources, args)) {
  log.info(`Sync triggered at ${new Date().toISOString()
    } by ${tickSource ?? 'schedule'}`);

  await mainLoopIteration(sources);
}
log.info('Process completed without error.');
