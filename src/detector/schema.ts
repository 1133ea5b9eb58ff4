/**
 * Detector Module - Schemas and Types
 *
 * Camera state, raw candidate signals and the detector contract shared by
 * the watch and poll strategies.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { DetectorError } from "./errors.js";

// =============================================================================
// Camera State
// =============================================================================

const CameraStateSchema = z.enum(["ON", "OFF"]);

/**
 * Whether the capture device is in use. Doubles as the MQTT payload.
 */
export type CameraState = z.infer<typeof CameraStateSchema>;

/**
 * A candidate state as observed by a detector, stamped with the time it was
 * produced (epoch ms). Not retained.
 */
export type RawSignal = Readonly<{
  state: CameraState;
  observedAt: number;
}>;

/**
 * A single open/close event reported by inotifywait.
 */
export type WatchEvent = Readonly<{
  device: string;
  state: CameraState;
}>;

// =============================================================================
// Detector Contract
// =============================================================================

export type DetectorKind = "watch" | "poll";

/**
 * Source of raw candidate signals.
 *
 * `next()` yields either a signal or a non-fatal failure; fatal problems are
 * only reported by `start()`.
 */
export interface StateDetector {
  readonly kind: DetectorKind;
  start(): Promise<Result<void, DetectorError>>;
  next(): Promise<Result<RawSignal, DetectorError>>;
  stop(): void;
}

/**
 * Expands the device glob into the device nodes currently present.
 */
export type DeviceLister = (
  pattern: string,
) => Promise<Result<string[], DetectorError>>;

/**
 * Returns the PIDs holding any of the given device nodes open.
 */
export type ProcessInspector = (
  devices: readonly string[],
) => Promise<Result<number[], DetectorError>>;

/**
 * The parts of a spawned inotifywait the watch detector relies on.
 */
export type WatchProcess = Readonly<{
  stdout: NodeJS.ReadableStream;
  stderr: NodeJS.ReadableStream;
  kill: () => boolean;
  onExit: (listener: (code: number | null) => void) => void;
  onError: (listener: (error: Error) => void) => void;
}>;

export type SpawnWatcher = (
  command: string,
  args: readonly string[],
) => WatchProcess;

// =============================================================================
// Strategy Options
// =============================================================================

export type WatchDetectorOptions = Readonly<{
  pattern: string;
  restartDelayMs: number;
  listDevices?: DeviceLister;
  spawnWatcher?: SpawnWatcher;
  now?: () => number;
}>;

export type PollDetectorOptions = Readonly<{
  pattern: string;
  intervalMs: number;
  listDevices?: DeviceLister;
  inspect?: ProcessInspector;
  now?: () => number;
}>;

export type DetectorSettings = Readonly<{
  kind: DetectorKind;
  pattern: string;
  pollIntervalMs: number;
  restartDelayMs: number;
}>;
