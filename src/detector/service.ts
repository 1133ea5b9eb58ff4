/**
 * Detector Module - Service Layer
 *
 * Side effects shared by both strategies: device enumeration, the lsof
 * holder lookup and spawning inotifywait.
 */
import { execFile, spawn } from "node:child_process";
import fg from "fast-glob";
import { type Result, err, ok } from "neverthrow";

import type { DetectorError } from "./errors.js";
import { enumerationFailed } from "./errors.js";
import type { SpawnWatcher } from "./schema.js";
import { LSOF_COMMAND, buildLsofArgs, interpretLsofExit } from "./transform.js";

// =============================================================================
// Device Enumeration
// =============================================================================

/**
 * List the device nodes currently matching the glob, sorted.
 * Character devices are not regular files, so onlyFiles must be off.
 */
export async function listDeviceNodes(
  pattern: string,
): Promise<Result<string[], DetectorError>> {
  try {
    const matches = await fg(pattern, {
      onlyFiles: false,
      absolute: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    return ok([...matches].sort());
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(enumerationFailed(pattern, cause.message, cause));
  }
}

// =============================================================================
// Process Introspection
// =============================================================================

/**
 * Run `lsof -t` over the devices and return the PIDs holding them.
 */
export function runLsof(
  devices: readonly string[],
): Promise<Result<number[], DetectorError>> {
  return new Promise((resolve) => {
    execFile(LSOF_COMMAND, buildLsofArgs(devices), (error, stdout) => {
      if (!error) {
        resolve(interpretLsofExit(null, stdout));
        return;
      }
      const code: unknown = error.code;
      const exitCode =
        typeof code === "number" || typeof code === "string" ? code : "unknown";
      resolve(interpretLsofExit(exitCode, stdout, error));
    });
  });
}

// =============================================================================
// inotifywait
// =============================================================================

/**
 * Spawn inotifywait with piped output.
 */
export const spawnInotifywait: SpawnWatcher = (command, args) => {
  const child = spawn(command, [...args], {
    stdio: ["ignore", "pipe", "pipe"],
  });

  return {
    stdout: child.stdout,
    stderr: child.stderr,
    kill: () => child.kill(),
    onExit: (listener) => {
      child.on("exit", (code) => listener(code));
    },
    onError: (listener) => {
      child.on("error", listener);
    },
  };
};
