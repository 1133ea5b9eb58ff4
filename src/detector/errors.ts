/**
 * Detector Module - Error Types
 *
 * Typed error unions for camera detection.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while detecting camera usage.
 */
export type DetectorError =
  | {
      readonly type: "WATCH_UNAVAILABLE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "WATCH_INTERRUPTED";
      readonly exitCode: number | null;
      readonly message: string;
    }
  | {
      readonly type: "ENUMERATION_FAILED";
      readonly pattern: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INTROSPECTION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a WATCH_UNAVAILABLE error.
 */
export function watchUnavailable(message: string, cause?: Error): DetectorError {
  if (cause) {
    return { type: "WATCH_UNAVAILABLE", message, cause };
  }
  return { type: "WATCH_UNAVAILABLE", message };
}

/**
 * Create a WATCH_INTERRUPTED error.
 */
export function watchInterrupted(exitCode: number | null): DetectorError {
  return {
    type: "WATCH_INTERRUPTED",
    exitCode,
    message: `inotifywait exited unexpectedly (code ${exitCode ?? "none"})`,
  };
}

/**
 * Create an ENUMERATION_FAILED error.
 */
export function enumerationFailed(
  pattern: string,
  message: string,
  cause?: Error,
): DetectorError {
  if (cause) {
    return { type: "ENUMERATION_FAILED", pattern, message, cause };
  }
  return { type: "ENUMERATION_FAILED", pattern, message };
}

/**
 * Create an INTROSPECTION_FAILED error.
 */
export function introspectionFailed(
  message: string,
  cause?: Error,
): DetectorError {
  if (cause) {
    return { type: "INTROSPECTION_FAILED", message, cause };
  }
  return { type: "INTROSPECTION_FAILED", message };
}

/**
 * Format a DetectorError for logging.
 */
export function formatDetectorError(error: DetectorError): string {
  switch (error.type) {
    case "WATCH_UNAVAILABLE":
      return `Device watch unavailable: ${error.message}`;
    case "WATCH_INTERRUPTED":
      return `Device watch interrupted: ${error.message}`;
    case "ENUMERATION_FAILED":
      return `Could not list devices matching ${error.pattern}: ${error.message}`;
    case "INTROSPECTION_FAILED":
      return `Device holder lookup failed: ${error.message}`;
  }
}
