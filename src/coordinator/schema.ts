/**
 * Coordinator Module - Schemas and Types
 *
 * Loop state and the collaborators the event loop drives.
 */
import type { Result } from "neverthrow";

import type { BrokerPublisher } from "../broker/index.js";
import type { DebounceState } from "../debounce/index.js";
import type { StateDetector } from "../detector/index.js";
import type { CoordinatorError } from "./errors.js";

/**
 * What a failed lsof poll does: log and retry on the next interval, or stop
 * the loop.
 */
export type IntrospectionFailurePolicy = "retry" | "fatal";

export type CoordinatorOptions = Readonly<{
  detector: StateDetector;
  publisher: Pick<BrokerPublisher, "publishDiscovery" | "publishState" | "nextEvent">;
  /** Debounce window (ms) */
  windowMs: number;
  /** Longest the loop waits without any other source being ready (ms) */
  idleTickMs: number;
  introspectionFailurePolicy: IntrospectionFailurePolicy;
  now?: () => number;
}>;

/**
 * Coordinator state, owned by the loop.
 */
export type CoordinatorState = Readonly<{
  debounce: DebounceState;
  /** Whether the loop is running */
  isRunning: boolean;
  /** Completed loop iterations; also rotates source priority */
  iteration: number;
  /** Confirmed transitions announced (successfully or not) */
  transitions: number;
  /** State publishes that failed */
  publishFailures: number;
}>;

export interface Coordinator {
  run(): Promise<Result<void, CoordinatorError>>;
  stop(): void;
  getState(): CoordinatorState;
}
