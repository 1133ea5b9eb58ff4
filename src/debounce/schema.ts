/**
 * Debounce Module - Schemas and Types
 *
 * The settle-window state owned by the coordinator loop.
 */
import type { CameraState } from "../detector/index.js";

/**
 * Debounce state for one process lifetime.
 *
 * `stableState` is the last confirmed value and changes at most once per
 * window. `candidate` is the most recent raw observation, held so a value
 * that arrived inside the window can be confirmed once the window elapses.
 */
export type DebounceState = Readonly<{
  /** Last confirmed (published) state */
  stableState: CameraState;
  /** When `stableState` last changed (epoch ms) */
  lastTransitionAt: number;
  /** Latest raw candidate */
  candidate: CameraState;
}>;

/**
 * Result of feeding the debouncer: its next state and, when confirmed,
 * the transition to announce.
 */
export type DebounceOutcome = Readonly<{
  state: DebounceState;
  transition: CameraState | null;
}>;
