/**
 * Coordinator Module - Service Layer
 *
 * The event loop. Each iteration races the detector, the broker's inbound
 * events and an idle tick; exactly one ready source is serviced per
 * iteration. A source that loses the race keeps its pending promise for the
 * next iteration, so no signal is dropped.
 */
import { type Result, err, ok } from "neverthrow";

import type { BrokerEvent } from "../broker/index.js";
import { formatBrokerError } from "../broker/index.js";
import type { CameraState, DetectorError, RawSignal } from "../detector/index.js";
import { formatDetectorError } from "../detector/index.js";
import {
  initialDebounceState,
  observeSignal,
  settlePending,
} from "../debounce/index.js";
import type { DebounceOutcome } from "../debounce/index.js";
import {
  createLogger,
  logPublishAcknowledged,
  logPublishFailed,
} from "../logger.js";
import type { CoordinatorError } from "./errors.js";
import { alreadyRunning, detectorFailed, detectorStartFailed } from "./errors.js";
import type {
  Coordinator,
  CoordinatorOptions,
  CoordinatorState,
} from "./schema.js";
import {
  brokerEventLevel,
  describeBrokerEvent,
  idleTickDelay,
  isFatalDetectorError,
  rotateSources,
} from "./transform.js";

const log = createLogger("coordinator");

type LoopEvent =
  | { readonly source: "detector"; readonly result: Result<RawSignal, DetectorError> }
  | { readonly source: "broker"; readonly event: BrokerEvent }
  | { readonly source: "tick" }
  | { readonly source: "stop" };

type Tick = Readonly<{
  promise: Promise<LoopEvent>;
  cancel: () => void;
}>;

function createTick(delayMs: number): Tick {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const promise = new Promise<LoopEvent>((resolve) => {
    timer = setTimeout(() => resolve({ source: "tick" }), delayMs);
  });
  return {
    promise,
    cancel: () => {
      if (timer) clearTimeout(timer);
    },
  };
}

export function createCoordinator(options: CoordinatorOptions): Coordinator {
  const {
    detector,
    publisher,
    windowMs,
    idleTickMs,
    introspectionFailurePolicy,
    now = Date.now,
  } = options;

  let state: CoordinatorState = {
    debounce: initialDebounceState(now(), windowMs),
    isRunning: false,
    iteration: 0,
    transitions: 0,
    publishFailures: 0,
  };
  let stopRequested = false;
  let requestStop: (() => void) | null = null;

  // ===========================================================================
  // Handlers
  // ===========================================================================

  /**
   * Publish a confirmed transition. The state stays confirmed even when the
   * publish fails; the next transition publishes normally.
   */
  async function announce(transition: CameraState): Promise<void> {
    const startTime = Date.now();
    state = { ...state, transitions: state.transitions + 1 };
    log.info({ state: transition }, "Camera state changed");

    const result = await publisher.publishState(transition);
    if (result.isOk()) {
      logPublishAcknowledged(log, "state", startTime, { state: transition });
      return;
    }

    state = { ...state, publishFailures: state.publishFailures + 1 };
    logPublishFailed(log, "state", formatBrokerError(result.error), {
      state: transition,
    });
  }

  async function applyOutcome(outcome: DebounceOutcome): Promise<void> {
    state = { ...state, debounce: outcome.state };
    if (outcome.transition !== null) {
      await announce(outcome.transition);
    }
  }

  async function handleDetector(
    result: Result<RawSignal, DetectorError>,
  ): Promise<Result<void, CoordinatorError>> {
    if (result.isErr()) {
      if (isFatalDetectorError(result.error, introspectionFailurePolicy)) {
        log.fatal({ error: result.error.type }, formatDetectorError(result.error));
        return err(detectorFailed(result.error));
      }
      log.warn({ error: result.error.type }, formatDetectorError(result.error));
      return ok(undefined);
    }

    log.debug(
      { candidate: result.value.state, confirmed: state.debounce.stableState },
      "Raw signal",
    );
    await applyOutcome(observeSignal(state.debounce, result.value, windowMs));
    return ok(undefined);
  }

  function handleBroker(event: BrokerEvent): void {
    log[brokerEventLevel(event)]({ event: event.type }, describeBrokerEvent(event));
  }

  async function handleTick(): Promise<void> {
    await applyOutcome(settlePending(state.debounce, now(), windowMs));
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  async function loop(
    stopSignal: Promise<LoopEvent>,
  ): Promise<Result<void, CoordinatorError>> {
    let detectorPending: Promise<LoopEvent> | null = null;
    let brokerPending: Promise<LoopEvent> | null = null;

    while (!stopRequested) {
      detectorPending ??= detector
        .next()
        .then((result): LoopEvent => ({ source: "detector", result }));
      brokerPending ??= publisher
        .nextEvent()
        .then((event): LoopEvent => ({ source: "broker", event }));
      const tick = createTick(
        idleTickDelay(state.debounce, now(), windowMs, idleTickMs),
      );

      const event = await Promise.race([
        stopSignal,
        ...rotateSources(
          [detectorPending, brokerPending, tick.promise],
          state.iteration,
        ),
      ]);
      tick.cancel();
      state = { ...state, iteration: state.iteration + 1 };

      switch (event.source) {
        case "stop":
          return ok(undefined);
        case "detector": {
          detectorPending = null;
          const handled = await handleDetector(event.result);
          if (handled.isErr()) return handled;
          break;
        }
        case "broker":
          brokerPending = null;
          handleBroker(event.event);
          break;
        case "tick":
          await handleTick();
          break;
      }
    }

    return ok(undefined);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    /**
     * Start the detector, announce discovery once and run until stopped or
     * a fatal detector failure.
     */
    run: async () => {
      if (state.isRunning) return err(alreadyRunning());

      const started = await detector.start();
      if (started.isErr()) {
        return err(detectorStartFailed(started.error));
      }

      const discoveryStart = Date.now();
      log.info("Announcing sensor to Home Assistant");
      const discovery = await publisher.publishDiscovery();
      if (discovery.isOk()) {
        logPublishAcknowledged(log, "discovery", discoveryStart);
      } else {
        logPublishFailed(log, "discovery", formatBrokerError(discovery.error));
      }

      stopRequested = false;
      const stopSignal = new Promise<LoopEvent>((resolve) => {
        requestStop = () => resolve({ source: "stop" });
      });
      state = {
        ...state,
        isRunning: true,
        debounce: initialDebounceState(now(), windowMs),
      };
      log.info(
        { windowMs, idleTickMs, detector: detector.kind },
        "Event loop started",
      );

      try {
        return await loop(stopSignal);
      } finally {
        detector.stop();
        requestStop = null;
        state = { ...state, isRunning: false };
        log.info("Event loop stopped");
      }
    },

    stop: () => {
      if (!state.isRunning) {
        log.warn("Event loop not running");
        return;
      }
      log.info("Stopping event loop...");
      stopRequested = true;
      requestStop?.();
    },

    getState: () => state,
  };
}
