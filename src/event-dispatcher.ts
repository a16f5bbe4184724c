/** Pumps engine events to a front end. */

import type { DebugEngine, ExitEvent, StopEvent } from "./engine/base.js";
import { createLogger } from "./logger.js";

const log = createLogger("events");

export interface EngineEventSink {
  onStop(event: StopEvent): void | Promise<void>;
  onExit(event: ExitEvent): void | Promise<void>;
}

export type PumpResult = "exited" | "stopped" | "ended";

export interface PumpOptions {
  /**
   * Return after the first exit event. Defaults to true; a front end that
   * can launch again turns it off and keeps pumping.
   */
  untilExit?: boolean;
}

/**
 * Receive events from `engine` and hand each one to `sink`, in order.
 * Resolves with "exited" after the first exit event has been handled
 * (unless `untilExit` is off), "stopped" when `signal` aborts first, or
 * "ended" once the engine's event stream finishes.
 */
export async function pumpEngineEvents(
  engine: DebugEngine,
  sink: EngineEventSink,
  signal?: AbortSignal,
  { untilExit = true }: PumpOptions = {},
): Promise<PumpResult> {
  const iterator = engine.events()[Symbol.asyncIterator]();
  const aborted = abortPromise(signal);

  try {
    while (true) {
      const next = await Promise.race([iterator.next(), aborted.promise]);
      if (next === ABORTED) return "stopped";
      if (next.done) return "ended";

      const event = next.value;
      log.debug({ type: event.type, reason: event.type === "stop" ? event.reason : undefined }, "received event");
      if (event.type === "stop") {
        await sink.onStop(event);
      } else {
        await sink.onExit(event);
        if (untilExit) return "exited";
      }
    }
  } finally {
    aborted.dispose();
    // Not awaited: a generator's return() queues behind its pending next().
    iterator.return?.().catch((err: unknown) => log.debug({ err }, "closing event stream failed"));
  }
}

const ABORTED = Symbol("aborted");

function abortPromise(signal?: AbortSignal): { promise: Promise<typeof ABORTED>; dispose: () => void } {
  if (!signal) return { promise: new Promise(() => {}), dispose: () => {} };
  if (signal.aborted) return { promise: Promise.resolve(ABORTED), dispose: () => {} };

  let onAbort = (): void => {};
  const promise = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}
