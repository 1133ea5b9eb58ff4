/**
 * Broker Module - Pure Transformations
 *
 * Topic layout, discovery descriptor and state message construction.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { CameraState } from "../detector/index.js";
import type { BrokerError } from "./errors.js";
import { invalidDescriptor } from "./errors.js";
import type {
  BrokerTopics,
  DiscoveryDescriptor,
  DiscoverySettings,
  OutboundMessage,
  StateMessage,
} from "./schema.js";
import { DiscoveryDescriptorSchema } from "./schema.js";

export const PAYLOAD_ON = "ON";
export const PAYLOAD_OFF = "OFF";

/**
 * Topics for a binary_sensor under the discovery prefix.
 *
 * @example
 * buildTopics("homeassistant", "officecamera").state
 * // "homeassistant/binary_sensor/officecamera/state"
 */
export function buildTopics(prefix: string, nodeId: string): BrokerTopics {
  const base = `${prefix.replace(/\/+$/, "")}/binary_sensor/${nodeId}`;
  return {
    state: `${base}/state`,
    config: `${base}/config`,
  };
}

/**
 * Build the discovery descriptor once at startup.
 */
export function buildDiscoveryDescriptor(
  settings: DiscoverySettings,
  topics: BrokerTopics,
): DiscoveryDescriptor {
  return {
    name: settings.sensorName,
    device: {
      identifiers: [settings.nodeId],
      name: settings.deviceName,
      sw_version: settings.swVersion,
      model: settings.model,
      manufacturer: settings.manufacturer,
    },
    state_topic: topics.state,
    device_class: settings.deviceClass,
    payload_on: PAYLOAD_ON,
    payload_off: PAYLOAD_OFF,
  };
}

/**
 * Validate and serialize the descriptor into the retained config message.
 */
export function buildDiscoveryMessage(
  descriptor: DiscoveryDescriptor,
  topics: BrokerTopics,
): Result<OutboundMessage, BrokerError> {
  const parsed = DiscoveryDescriptorSchema.safeParse(descriptor);
  if (!parsed.success) {
    return err(
      invalidDescriptor(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      ),
    );
  }

  const message: OutboundMessage = {
    topic: topics.config,
    payload: JSON.stringify(parsed.data),
    qos: 1,
    retain: true,
  };
  return ok(message);
}

/**
 * One retained state message per confirmed transition.
 */
export function buildStateMessage(
  state: CameraState,
  topics: BrokerTopics,
): StateMessage {
  return {
    topic: topics.state,
    payload: state,
    qos: 1,
    retain: true,
  };
}

/**
 * How long to hold the next publish so consecutive publishes are at least
 * `throttleMs` apart.
 */
export function throttleDelay(
  lastPublishAt: number | null,
  throttleMs: number,
  now: number,
): number {
  if (lastPublishAt === null || throttleMs <= 0) return 0;
  return Math.max(0, lastPublishAt + throttleMs - now);
}
