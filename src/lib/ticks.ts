import type { ControllerConfig } from "../defs/config.ts";
import type { DnsSource } from "../defs/types.ts";

import * as ows from "./streams.ts";

/**
 * Builds a stream of one or more 'ticks', which are events that
 * result in the controller performing a fresh reconcile loop.
 * If "--once" was passed in, this stream closes after a single tick.
 * Otherwise it's an infinite stream either from a fast timer interval
 * or, if enabled, from Docker events plus a slow timer.
 * Tick values are either null, or the source type that caused them via event.
 */
export function createTickStream(
  config: ControllerConfig,
  sources: DnsSource[],
  args: ReadonlyArray<string> = process.argv,
): AsyncGenerator<string | null> {
  const tickStreams = new Array<AsyncIterable<string | null>>();

  // Always start with one tick as startup
  tickStreams.push(ows.just(null));

  if (args.includes('--once')) { // one run only

    // Add nothing else
    // Loop completes after initial tick.

  } else if (config.enable_watching) { // Watch + interval

    // Subscribe to every source's events
    for (const source of sources) {
      tickStreams.push(ows.map(source.MakeEventSource(), () => source.config.type));
    }

    // Also regular infrequent ticks just in case
    tickStreams.push(makeTimer(config.interval_seconds ?? (60 * 60)));

  } else { // interval only

    // Just plain regular ticks at a fixed interval
    tickStreams.push(makeTimer(config.interval_seconds ?? (1 * 60)));

  }

  // Merge every tick source and debounce
  return ows.debounce(ows.merge(...tickStreams),
    (config.debounce_seconds ?? 2) * 1000);
};

function makeTimer(intervalSeconds: number) {
  return ows.map(ows.fromTimer(intervalSeconds * 1000), () => null);
}
