import { pino, type Level, type Logger } from "pino";
import pretty from "pino-pretty";

export type LevelName = Extract<Level, 'debug' | 'info' | 'warn' | 'error'>;

/** Process-wide logger. Replaced by setupLogs once the CLI flags are known. */
export let log: Logger = pino({ level: 'info' });

export function setupLogs(opts: {
  logLevel: LevelName,
  logFormat: 'json' | 'console',
}) {
  log = opts.logFormat == 'json'
    ? pino({ level: opts.logLevel })
    : pino({ level: opts.logLevel }, pretty({
        colorize: process.stdout.isTTY,
        ignore: 'pid,hostname',
        sync: true,
      }));
  return log;
}
