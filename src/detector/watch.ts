/**
 * Detector Module - Watch Strategy
 *
 * Event-driven detection: inotifywait reports every open and close on the
 * capture device nodes. An exit after a successful start is transient: the
 * watcher is re-spawned after a delay, re-enumerating the devices.
 */
import { createInterface } from "node:readline";
import { type Result, err, ok } from "neverthrow";

import { createChannel } from "../channel.js";
import { createLogger } from "../logger.js";
import type { DetectorError } from "./errors.js";
import {
  formatDetectorError,
  watchInterrupted,
  watchUnavailable,
} from "./errors.js";
import type {
  RawSignal,
  StateDetector,
  WatchDetectorOptions,
  WatchProcess,
} from "./schema.js";
import { listDeviceNodes, spawnInotifywait } from "./service.js";
import {
  INOTIFYWAIT_COMMAND,
  buildInotifyArgs,
  isWatchReadyLine,
  parseWatchLine,
} from "./transform.js";

const log = createLogger("detector");

export function createWatchDetector(
  options: WatchDetectorOptions,
): StateDetector {
  const {
    pattern,
    restartDelayMs,
    listDevices = listDeviceNodes,
    spawnWatcher = spawnInotifywait,
    now = Date.now,
  } = options;

  const signals = createChannel<Result<RawSignal, DetectorError>>();
  let current: WatchProcess | null = null;
  let restartTimer: ReturnType<typeof setTimeout> | null = null;
  let started = false;
  let stopped = false;

  /**
   * Spawn inotifywait over the devices and resolve once its watches are
   * established, or with the reason they never were.
   */
  function attach(devices: string[]): Promise<Result<void, DetectorError>> {
    return new Promise((resolve) => {
      let established = false;
      let settled = false;
      const settle = (result: Result<void, DetectorError>): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const proc = spawnWatcher(INOTIFYWAIT_COMMAND, buildInotifyArgs(devices));
      current = proc;

      createInterface({ input: proc.stdout }).on("line", (line) => {
        const event = parseWatchLine(line);
        if (!event) {
          log.trace({ line }, "Ignoring watch output");
          return;
        }
        log.debug({ device: event.device, state: event.state }, "Device activity");
        signals.push(ok({ state: event.state, observedAt: now() }));
      });

      createInterface({ input: proc.stderr }).on("line", (line) => {
        if (isWatchReadyLine(line)) {
          established = true;
          log.info({ devices }, "Watching capture devices");
          settle(ok(undefined));
          return;
        }
        log.debug({ line }, "inotifywait");
      });

      proc.onError((error) => {
        if (!established) {
          settle(err(watchUnavailable(`Could not start ${INOTIFYWAIT_COMMAND}`, error)));
          return;
        }
        log.error({ error: error.message }, "inotifywait error");
      });

      proc.onExit((code) => {
        if (current === proc) current = null;
        if (!established) {
          settle(
            err(
              watchUnavailable(
                `${INOTIFYWAIT_COMMAND} exited with code ${code ?? "none"} before watches were established`,
              ),
            ),
          );
          return;
        }
        if (stopped) return;
        signals.push(err(watchInterrupted(code)));
        scheduleRestart();
      });
    });
  }

  /**
   * Enumerate devices and watch them. No devices is not an error: nothing
   * is spawned and the detector stays silent. After a restart the lookup is
   * repeated every `restartDelayMs` until a device is back.
   */
  async function establish(): Promise<Result<void, DetectorError>> {
    const devices = await listDevices(pattern);
    if (devices.isErr()) return err(devices.error);

    if (devices.value.length === 0) {
      log.warn({ pattern }, "No capture devices matched; camera stays OFF");
      return ok(undefined);
    }

    return attach(devices.value);
  }

  function scheduleRestart(): void {
    if (stopped || restartTimer) return;
    log.warn({ delayMs: restartDelayMs }, "Restarting device watch");

    restartTimer = setTimeout(() => {
      restartTimer = null;
      if (stopped) return;
      establish()
        .then((result) => {
          if (result.isErr()) {
            log.error(formatDetectorError(result.error));
            signals.push(err(result.error));
            scheduleRestart();
            return;
          }
          // No devices yet: keep looking until one reappears
          if (!current) scheduleRestart();
        })
        .catch((error: unknown) => {
          log.error({ error }, "Device watch restart crashed");
          scheduleRestart();
        });
    }, restartDelayMs);
  }

  return {
    kind: "watch",

    start: async () => {
      if (started) return ok(undefined);
      started = true;
      stopped = false;
      return establish();
    },

    next: () => signals.next(),

    stop: () => {
      stopped = true;
      if (restartTimer) {
        clearTimeout(restartTimer);
        restartTimer = null;
      }
      current?.kill();
      current = null;
    },
  };
}
