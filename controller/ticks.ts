import { setInterval } from "node:timers/promises";

import type { ControllerConfig } from "../common/config.ts";

export type TickReason = 'startup' | 'schedule';

/** Ticks once at startup, then on every interval until the signal aborts */
export async function* createTicks(
  config: Pick<ControllerConfig, 'interval_seconds'>,
  opts: { once: boolean; signal: AbortSignal },
): AsyncGenerator<TickReason> {
  // Always start with one tick as startup
  yield 'startup';
  if (opts.once) return;

  try {
    for await (const _ of setInterval(config.interval_seconds * 1000, undefined, { signal: opts.signal })) {
      yield 'schedule';
    }
  } catch (err) {
    if (opts.signal.aborted) return;
    throw err;
  }
}
