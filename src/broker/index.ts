/**
 * Broker Module - Public API
 *
 * Exports types, service functions, and transformations for the broker module.
 */

// Types
export type {
  BrokerClient,
  BrokerEvent,
  BrokerPublisher,
  BrokerPublisherOptions,
  BrokerSettings,
  BrokerTopics,
  DiscoveryDescriptor,
  DiscoverySettings,
  OutboundMessage,
  PublishOptions,
  QoS,
  StateMessage,
} from "./schema.js";
export { DiscoveryDescriptorSchema } from "./schema.js";

// Errors
export type { BrokerError } from "./errors.js";
export {
  formatBrokerError,
  invalidDescriptor,
  publishFailed,
  publishTimeout,
} from "./errors.js";

// Service functions
export { connectBroker, createBrokerPublisher } from "./service.js";

// Pure transformations (for testing)
export {
  PAYLOAD_OFF,
  PAYLOAD_ON,
  buildDiscoveryDescriptor,
  buildDiscoveryMessage,
  buildStateMessage,
  buildTopics,
  throttleDelay,
} from "./transform.js";
