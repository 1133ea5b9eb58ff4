/**
 * Broker Module - Schemas and Types
 *
 * Home Assistant discovery descriptor, state messages and the narrow client
 * contract the publisher depends on.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { CameraState } from "../detector/index.js";
import type { BrokerError } from "./errors.js";

// =============================================================================
// Discovery Descriptor
// =============================================================================

/**
 * Home Assistant MQTT discovery payload for a binary_sensor.
 * Topic: <prefix>/binary_sensor/<node_id>/config
 */
export const DiscoveryDescriptorSchema = z
  .object({
    name: z.string().min(1).describe("Entity name"),
    device: z
      .object({
        identifiers: z.array(z.string().min(1)).min(1),
        name: z.string().min(1),
        sw_version: z.string().min(1),
        model: z.string().min(1),
        manufacturer: z.string().min(1),
      })
      .strict(),
    state_topic: z.string().min(1),
    device_class: z.string().min(1),
    payload_on: z.literal("ON"),
    payload_off: z.literal("OFF"),
  })
  .strict();

export type DiscoveryDescriptor = z.infer<typeof DiscoveryDescriptorSchema>;

/**
 * Identity values the descriptor is built from.
 */
export type DiscoverySettings = Readonly<{
  prefix: string;
  nodeId: string;
  sensorName: string;
  deviceName: string;
  model: string;
  manufacturer: string;
  deviceClass: string;
  swVersion: string;
}>;

// =============================================================================
// Topics and Messages
// =============================================================================

export type BrokerTopics = Readonly<{
  state: string;
  config: string;
}>;

export type QoS = 0 | 1 | 2;

export type PublishOptions = Readonly<{
  qos: QoS;
  retain: boolean;
}>;

/**
 * A message ready for the wire. State and discovery messages are both
 * retained and delivered at least once.
 */
export type OutboundMessage<TPayload extends string = string> = Readonly<{
  topic: string;
  payload: TPayload;
  qos: 1;
  retain: true;
}>;

export type StateMessage = OutboundMessage<CameraState>;

// =============================================================================
// Connection
// =============================================================================

export type BrokerSettings = Readonly<{
  url: string;
  clientId: string;
  username: string | undefined;
  password: string | undefined;
  keepAliveSeconds: number;
  reconnectPeriodMs: number;
  throttleMs: number;
  publishTimeoutMs: number;
}>;

/**
 * Inbound connection activity, surfaced for logging only.
 */
export type BrokerEvent =
  | { readonly type: "connect"; readonly sessionPresent: boolean }
  | { readonly type: "reconnect" }
  | { readonly type: "close" }
  | { readonly type: "offline" }
  | { readonly type: "error"; readonly message: string }
  | { readonly type: "message"; readonly topic: string; readonly payload: string }
  | {
      readonly type: "packet";
      readonly cmd: string;
      readonly messageId: number | null;
    };

/**
 * What the publisher needs from an MQTT connection.
 */
export interface BrokerClient {
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  onEvent(listener: (event: BrokerEvent) => void): void;
  end(): Promise<void>;
}

/**
 * Publisher over one broker connection. Called strictly sequentially.
 */
export interface BrokerPublisher {
  readonly topics: BrokerTopics;
  publishDiscovery(): Promise<Result<void, BrokerError>>;
  publishState(state: CameraState): Promise<Result<void, BrokerError>>;
  nextEvent(): Promise<BrokerEvent>;
  close(): Promise<void>;
}

export type BrokerPublisherOptions = Readonly<{
  client: BrokerClient;
  topics: BrokerTopics;
  descriptor: DiscoveryDescriptor;
  throttleMs: number;
  publishTimeoutMs: number;
  now?: () => number;
}>;
