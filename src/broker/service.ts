/**
 * Broker Module - Service Layer
 *
 * MQTT connection management and retained publishing.
 * Uses Result types for explicit error handling; logging policy belongs to
 * the caller.
 */
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { type Result, err, ok } from "neverthrow";

import { createChannel } from "../channel.js";
import type { CameraState } from "../detector/index.js";
import type { BrokerError } from "./errors.js";
import { publishFailed, publishTimeout } from "./errors.js";
import type {
  BrokerClient,
  BrokerEvent,
  BrokerPublisher,
  BrokerPublisherOptions,
  BrokerSettings,
  OutboundMessage,
} from "./schema.js";
import {
  buildDiscoveryMessage,
  buildStateMessage,
  throttleDelay,
} from "./transform.js";

// =============================================================================
// MQTT Client
// =============================================================================

function toClientOptions(settings: BrokerSettings): IClientOptions {
  const options: IClientOptions = {
    clientId: settings.clientId,
    keepalive: settings.keepAliveSeconds,
    reconnectPeriod: settings.reconnectPeriodMs,
    connectTimeout: 10000,
    clean: true,
  };
  if (settings.username) options.username = settings.username;
  if (settings.password) options.password = settings.password;
  return options;
}

/**
 * Forward client activity as BrokerEvents. An "error" listener must always
 * be attached or the client's EventEmitter throws.
 */
function forwardEvents(
  client: MqttClient,
  emit: (event: BrokerEvent) => void,
): void {
  client.on("connect", (packet) => {
    emit({ type: "connect", sessionPresent: packet.sessionPresent });
  });
  client.on("reconnect", () => emit({ type: "reconnect" }));
  client.on("close", () => emit({ type: "close" }));
  client.on("offline", () => emit({ type: "offline" }));
  client.on("error", (error) => {
    emit({ type: "error", message: error.message });
  });
  client.on("message", (topic, payload) => {
    emit({ type: "message", topic, payload: payload.toString("utf8") });
  });
  client.on("packetreceive", (packet) => {
    emit({ type: "packet", cmd: packet.cmd, messageId: packet.messageId ?? null });
  });
}

/**
 * Connect once to the broker. Reconnection is left to the mqtt client.
 */
export function connectBroker(settings: BrokerSettings): BrokerClient {
  const client = mqtt.connect(settings.url, toClientOptions(settings));
  const listeners: Array<(event: BrokerEvent) => void> = [];

  forwardEvents(client, (event) => {
    for (const listener of listeners) listener(event);
  });

  return {
    publish: async (topic, payload, options) => {
      await client.publishAsync(topic, payload, {
        qos: options.qos,
        retain: options.retain,
      });
    },
    onEvent: (listener) => {
      listeners.push(listener);
    },
    end: async () => {
      await client.endAsync();
    },
  };
}

// =============================================================================
// Publisher
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Settle a publish as a Result, giving up after `timeoutMs`. A QoS 1 publish
 * resolves on PUBACK; while the client is offline it would wait forever.
 */
function settlePublish(
  publish: Promise<void>,
  topic: string,
  timeoutMs: number,
): Promise<Result<void, BrokerError>> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      resolve(err(publishTimeout(topic, timeoutMs)));
    }, timeoutMs);

    publish.then(
      () => {
        clearTimeout(timer);
        resolve(ok(undefined));
      },
      (error: unknown) => {
        clearTimeout(timer);
        const cause = error instanceof Error ? error : new Error(String(error));
        resolve(err(publishFailed(topic, cause.message, cause)));
      },
    );
  });
}

/**
 * Create the publisher over an established client.
 *
 * Neither publish is retried: discovery is best-effort until the next
 * restart, and a failed state publish is superseded by the next confirmed
 * transition.
 */
export function createBrokerPublisher(
  options: BrokerPublisherOptions,
): BrokerPublisher {
  const {
    client,
    topics,
    descriptor,
    throttleMs,
    publishTimeoutMs,
    now = Date.now,
  } = options;

  const events = createChannel<BrokerEvent>();
  client.onEvent((event) => events.push(event));

  let lastPublishAt: number | null = null;

  async function send(
    message: OutboundMessage,
  ): Promise<Result<void, BrokerError>> {
    const delayMs = throttleDelay(lastPublishAt, throttleMs, now());
    if (delayMs > 0) await sleep(delayMs);
    lastPublishAt = now();

    let publish: Promise<void>;
    try {
      publish = client.publish(message.topic, message.payload, {
        qos: message.qos,
        retain: message.retain,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(publishFailed(message.topic, cause.message, cause));
    }
    return settlePublish(publish, message.topic, publishTimeoutMs);
  }

  return {
    topics,

    publishDiscovery: async () => {
      const message = buildDiscoveryMessage(descriptor, topics);
      if (message.isErr()) return err(message.error);
      return send(message.value);
    },

    publishState: (state: CameraState) => send(buildStateMessage(state, topics)),

    nextEvent: () => events.next(),

    close: () => client.end(),
  };
}
