/**
 * Detector Module - Pure Transformations
 *
 * Parsing of inotifywait and lsof output, command-line construction.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { DetectorError } from "./errors.js";
import { introspectionFailed } from "./errors.js";
import type { CameraState, WatchEvent } from "./schema.js";

export const INOTIFYWAIT_COMMAND = "inotifywait";
export const LSOF_COMMAND = "lsof";

/** Printed by inotifywait on stderr once every watch is in place. */
const WATCHES_ESTABLISHED = "Watches established";

// =============================================================================
// inotifywait
// =============================================================================

/**
 * Arguments for a monitoring inotifywait over the given device nodes.
 * Each output line is `<path> <EVENT[,EVENT]>`.
 */
export function buildInotifyArgs(devices: readonly string[]): string[] {
  return ["-m", "-e", "open", "-e", "close", "--format", "%w %e", ...devices];
}

/**
 * Whether an inotifywait stderr line signals that the watch is live.
 */
export function isWatchReadyLine(line: string): boolean {
  return line.includes(WATCHES_ESTABLISHED);
}

/**
 * Parse one inotifywait output line.
 *
 * OPEN maps to ON; CLOSE_WRITE and CLOSE_NOWRITE (reported together with
 * CLOSE) both map to OFF. Anything else is ignored.
 *
 * @returns The event, or null for lines that carry no open/close
 */
export function parseWatchLine(line: string): WatchEvent | null {
  const trimmed = line.trim();
  const separator = trimmed.lastIndexOf(" ");
  if (separator <= 0) return null;

  const device = trimmed.slice(0, separator);
  const events = trimmed.slice(separator + 1).split(",");

  if (events.includes("OPEN")) {
    return { device, state: "ON" };
  }
  if (
    events.includes("CLOSE") ||
    events.includes("CLOSE_WRITE") ||
    events.includes("CLOSE_NOWRITE")
  ) {
    return { device, state: "OFF" };
  }
  return null;
}

// =============================================================================
// lsof
// =============================================================================

/**
 * Arguments asking lsof for the bare PIDs holding the devices open.
 */
export function buildLsofArgs(devices: readonly string[]): string[] {
  return ["-t", ...devices];
}

/**
 * Parse `lsof -t` output: one PID per line.
 */
export function parseLsofOutput(stdout: string): number[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => /^\d+$/.test(line))
    .map((line) => Number.parseInt(line, 10));
}

/**
 * Interpret how an lsof run ended.
 *
 * lsof exits with 1 whenever one of the named files is not open by anyone,
 * so status 1 is a normal answer and its stdout still lists the holders of
 * the other devices. Any other failure (missing binary, signal) is an error.
 *
 * @param exitCode - Process exit status, a spawn error code, or null on success
 * @param stdout - Whatever lsof printed
 */
export function interpretLsofExit(
  exitCode: number | string | null,
  stdout: string,
  cause?: Error,
): Result<number[], DetectorError> {
  if (exitCode === null || exitCode === 0 || exitCode === 1) {
    return ok(parseLsofOutput(stdout));
  }
  return err(introspectionFailed(`lsof exited with ${exitCode}`, cause));
}

/**
 * Any process holding a device open means the camera is in use.
 */
export function stateFromHolders(pids: readonly number[]): CameraState {
  return pids.length > 0 ? "ON" : "OFF";
}
