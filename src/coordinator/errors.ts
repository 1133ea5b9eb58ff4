/**
 * Coordinator Module - Error Types
 *
 * The only ways the event loop ends with an error.
 */
import type { DetectorError } from "../detector/index.js";
import { formatDetectorError } from "../detector/index.js";

export type CoordinatorError =
  | {
      readonly type: "ALREADY_RUNNING";
      readonly message: string;
    }
  | {
      readonly type: "DETECTOR_START_FAILED";
      readonly message: string;
      readonly cause: DetectorError;
    }
  | {
      readonly type: "DETECTOR_FAILED";
      readonly message: string;
      readonly cause: DetectorError;
    };

/**
 * Create an ALREADY_RUNNING error.
 */
export function alreadyRunning(): CoordinatorError {
  return { type: "ALREADY_RUNNING", message: "Event loop is already running" };
}

/**
 * Create a DETECTOR_START_FAILED error.
 */
export function detectorStartFailed(cause: DetectorError): CoordinatorError {
  return {
    type: "DETECTOR_START_FAILED",
    message: formatDetectorError(cause),
    cause,
  };
}

/**
 * Create a DETECTOR_FAILED error.
 */
export function detectorFailed(cause: DetectorError): CoordinatorError {
  return {
    type: "DETECTOR_FAILED",
    message: formatDetectorError(cause),
    cause,
  };
}

/**
 * Format a CoordinatorError for logging.
 */
export function formatCoordinatorError(error: CoordinatorError): string {
  switch (error.type) {
    case "ALREADY_RUNNING":
      return error.message;
    case "DETECTOR_START_FAILED":
      return `Detector could not start: ${error.message}`;
    case "DETECTOR_FAILED":
      return `Detector failed: ${error.message}`;
  }
}
