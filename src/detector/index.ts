/**
 * Detector Module - Public API
 *
 * Modules import from other modules via index.ts only - no deep imports.
 */

// Types
export type {
  CameraState,
  DetectorKind,
  DetectorSettings,
  DeviceLister,
  PollDetectorOptions,
  ProcessInspector,
  RawSignal,
  SpawnWatcher,
  StateDetector,
  WatchDetectorOptions,
  WatchEvent,
  WatchProcess,
} from "./schema.js";

// Errors
export type { DetectorError } from "./errors.js";
export {
  enumerationFailed,
  formatDetectorError,
  introspectionFailed,
  watchInterrupted,
  watchUnavailable,
} from "./errors.js";

// Strategies
export { createPollDetector } from "./poll.js";
export { createWatchDetector } from "./watch.js";
export { createDetector } from "./strategy.js";

// Side effects
export { listDeviceNodes, runLsof, spawnInotifywait } from "./service.js";

// Pure transformations (for testing)
export {
  buildInotifyArgs,
  buildLsofArgs,
  interpretLsofExit,
  isWatchReadyLine,
  parseLsofOutput,
  parseWatchLine,
  stateFromHolders,
} from "./transform.js";
