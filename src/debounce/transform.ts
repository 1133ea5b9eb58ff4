/**
 * Debounce Module - Pure Transformations
 *
 * Collapses bursts of open/close activity into single confirmed
 * transitions. Devices emit several open/close pairs within milliseconds
 * when attached or probed; only a candidate that differs from the confirmed
 * state once a full window has passed since the last transition is
 * confirmed.
 *
 * No side effects, no I/O - just data in, data out.
 */
import type { CameraState, RawSignal } from "../detector/index.js";
import type { DebounceOutcome, DebounceState } from "./schema.js";

/**
 * Core gate: confirmed iff the window has elapsed and the candidate
 * differs from the last confirmed state.
 *
 * @returns The confirmed state, or null
 */
export function decideTransition(
  candidate: CameraState,
  elapsedMs: number,
  windowMs: number,
  lastConfirmed: CameraState,
): CameraState | null {
  if (elapsedMs >= windowMs && candidate !== lastConfirmed) {
    return candidate;
  }
  return null;
}

/**
 * State at loop start: OFF confirmed, with a full window already elapsed
 * so the first differing signal is confirmed at once.
 */
export function initialDebounceState(
  now: number,
  windowMs: number,
): DebounceState {
  return {
    stableState: "OFF",
    lastTransitionAt: now - windowMs,
    candidate: "OFF",
  };
}

/**
 * Decide on the held candidate at `at`.
 */
function evaluate(
  state: DebounceState,
  at: number,
  windowMs: number,
): DebounceOutcome {
  const transition = decideTransition(
    state.candidate,
    at - state.lastTransitionAt,
    windowMs,
    state.stableState,
  );

  if (transition === null) {
    return { state, transition: null };
  }

  return {
    state: { ...state, stableState: transition, lastTransitionAt: at },
    transition,
  };
}

/**
 * Record a raw signal as the candidate and decide at its observation time.
 * A signal equal to the confirmed state never moves the timer.
 */
export function observeSignal(
  state: DebounceState,
  signal: RawSignal,
  windowMs: number,
): DebounceOutcome {
  return evaluate({ ...state, candidate: signal.state }, signal.observedAt, windowMs);
}

/**
 * Re-decide the held candidate at `now`. Used by the idle tick to confirm a
 * candidate whose window has since elapsed.
 */
export function settlePending(
  state: DebounceState,
  now: number,
  windowMs: number,
): DebounceOutcome {
  return evaluate(state, now, windowMs);
}

/**
 * Time until the held candidate can be confirmed.
 *
 * @returns Milliseconds (0 if already due), or null when nothing is pending
 */
export function msUntilSettled(
  state: DebounceState,
  now: number,
  windowMs: number,
): number | null {
  if (state.candidate === state.stableState) return null;
  return Math.max(0, state.lastTransitionAt + windowMs - now);
}
