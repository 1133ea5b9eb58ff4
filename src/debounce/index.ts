/**
 * Debounce Module - Public API
 */
export type { DebounceOutcome, DebounceState } from "./schema.js";

export {
  decideTransition,
  initialDebounceState,
  msUntilSettled,
  observeSignal,
  settlePending,
} from "./transform.js";
