/**
 * Coordinator Module - Pure Transformations
 *
 * Source ordering and log routing for the event loop.
 */
import type { BrokerEvent } from "../broker/index.js";
import type { DetectorError } from "../detector/index.js";
import { msUntilSettled } from "../debounce/index.js";
import type { DebounceState } from "../debounce/index.js";
import type { IntrospectionFailurePolicy } from "./schema.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * Rotate the race order by iteration. When several sources are already
 * ready, Promise.race picks the first in order, so rotating keeps any one
 * source from starving the others.
 */
export function rotateSources<T>(sources: readonly T[], iteration: number): T[] {
  if (sources.length === 0) return [];
  const offset = iteration % sources.length;
  return [...sources.slice(offset), ...sources.slice(0, offset)];
}

/**
 * How long the idle tick should wait: the idle interval, or sooner if a
 * held candidate becomes confirmable first.
 */
export function idleTickDelay(
  debounce: DebounceState,
  now: number,
  windowMs: number,
  idleTickMs: number,
): number {
  const settleIn = msUntilSettled(debounce, now, windowMs);
  return settleIn === null ? idleTickMs : Math.min(idleTickMs, settleIn);
}

/**
 * Whether a detector failure ends the loop.
 */
export function isFatalDetectorError(
  error: DetectorError,
  policy: IntrospectionFailurePolicy,
): boolean {
  return error.type === "INTROSPECTION_FAILED" && policy === "fatal";
}

/**
 * Log level for an inbound broker event. Acks and pings are noise.
 */
export function brokerEventLevel(event: BrokerEvent): LogLevel {
  switch (event.type) {
    case "connect":
      return "info";
    case "reconnect":
    case "close":
    case "offline":
      return "warn";
    case "error":
      return "error";
    case "message":
      return "debug";
    case "packet":
      return event.cmd === "pingresp" ? "trace" : "debug";
  }
}

/**
 * Human-readable summary of a broker event.
 */
export function describeBrokerEvent(event: BrokerEvent): string {
  switch (event.type) {
    case "connect":
      return "Connected to MQTT broker";
    case "reconnect":
      return "Reconnecting to MQTT broker...";
    case "close":
      return "MQTT connection closed";
    case "offline":
      return "MQTT client offline";
    case "error":
      return `MQTT client error: ${event.message}`;
    case "message":
      return `Received message on ${event.topic}`;
    case "packet":
      return event.messageId === null
        ? `Received ${event.cmd}`
        : `Received ${event.cmd} for message ${event.messageId}`;
  }
}
