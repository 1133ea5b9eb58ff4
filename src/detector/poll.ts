/**
 * Detector Module - Poll Strategy
 *
 * Every interval, asks lsof which processes hold the devices open. Lossy:
 * an open shorter than the interval is never seen.
 */
import { type Result, err, ok } from "neverthrow";

import { createChannel } from "../channel.js";
import { createLogger } from "../logger.js";
import type { DetectorError } from "./errors.js";
import { introspectionFailed } from "./errors.js";
import type {
  PollDetectorOptions,
  RawSignal,
  StateDetector,
} from "./schema.js";
import { listDeviceNodes, runLsof } from "./service.js";
import { stateFromHolders } from "./transform.js";

const log = createLogger("detector");

export function createPollDetector(options: PollDetectorOptions): StateDetector {
  const {
    pattern,
    intervalMs,
    listDevices = listDeviceNodes,
    inspect = runLsof,
    now = Date.now,
  } = options;

  const signals = createChannel<Result<RawSignal, DetectorError>>();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let started = false;
  let stopped = false;

  async function poll(): Promise<Result<RawSignal, DetectorError>> {
    const devices = await listDevices(pattern);
    if (devices.isErr()) return err(devices.error);

    if (devices.value.length === 0) {
      const absent: RawSignal = { state: "OFF", observedAt: now() };
      return ok(absent);
    }

    const holders = await inspect(devices.value);
    return holders.map(
      (pids): RawSignal => ({ state: stateFromHolders(pids), observedAt: now() }),
    );
  }

  async function tick(): Promise<void> {
    let result: Result<RawSignal, DetectorError>;
    try {
      result = await poll();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      result = err(introspectionFailed("Unexpected poll failure", cause));
    }
    if (stopped) return;
    signals.push(result);
    schedule(intervalMs);
  }

  function schedule(delayMs: number): void {
    timer = setTimeout(() => {
      timer = null;
      tick().catch((error: unknown) => {
        log.error({ error }, "Poll tick crashed");
      });
    }, delayMs);
  }

  return {
    kind: "poll",

    start: async () => {
      if (!started) {
        started = true;
        stopped = false;
        log.info({ pattern, intervalMs }, "Polling capture device holders");
        schedule(0);
      }
      return ok(undefined);
    },

    next: () => signals.next(),

    stop: () => {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
  };
}
