/**
 * Broker Module - Error Types
 *
 * Typed error unions for MQTT publishing.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while publishing to the broker.
 */
export type BrokerError =
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PUBLISH_TIMEOUT";
      readonly topic: string;
      readonly timeoutMs: number;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_DESCRIPTOR";
      readonly issues: readonly string[];
      readonly message: string;
    };

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(
  topic: string,
  message: string,
  cause?: Error,
): BrokerError {
  if (cause) {
    return { type: "PUBLISH_FAILED", topic, message, cause };
  }
  return { type: "PUBLISH_FAILED", topic, message };
}

/**
 * Create a PUBLISH_TIMEOUT error.
 */
export function publishTimeout(topic: string, timeoutMs: number): BrokerError {
  return {
    type: "PUBLISH_TIMEOUT",
    topic,
    timeoutMs,
    message: "No acknowledgement from broker",
  };
}

/**
 * Create an INVALID_DESCRIPTOR error.
 */
export function invalidDescriptor(issues: readonly string[]): BrokerError {
  return {
    type: "INVALID_DESCRIPTOR",
    issues,
    message: "Discovery descriptor does not match schema",
  };
}

/**
 * Format a BrokerError for logging.
 */
export function formatBrokerError(error: BrokerError): string {
  switch (error.type) {
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "PUBLISH_TIMEOUT":
      return `Publish to ${error.topic} timed out after ${error.timeoutMs}ms: ${error.message}`;
    case "INVALID_DESCRIPTOR":
      return `${error.message}: ${error.issues.join("; ")}`;
  }
}
