#!/usr/bin/env node
/**
 * camera-sentinel - Application Entry Point
 *
 * Wires the pipeline:
 * - Detector (inotify watch or lsof poll) produces raw camera states
 * - Coordinator debounces them and drives the event loop
 * - Broker publisher announces discovery and confirmed states over MQTT
 *
 * Runs until killed by its supervisor.
 */
import "dotenv/config";

import {
  buildDiscoveryDescriptor,
  buildTopics,
  connectBroker,
  createBrokerPublisher,
} from "./broker/index.js";
import {
  APP_NAME,
  APP_VERSION,
  config,
  getBrokerSettings,
  getDetectorSettings,
  getDiscoverySettings,
} from "./config.js";
import { createCoordinator, formatCoordinatorError } from "./coordinator/index.js";
import { createDetector } from "./detector/index.js";
import { createLogger } from "./logger.js";

const log = createLogger("app");

// =============================================================================
// CONFIGURATION
// =============================================================================

const brokerSettings = getBrokerSettings();
const detectorSettings = getDetectorSettings();
const discoverySettings = getDiscoverySettings();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    version: APP_VERSION,
    env: config.NODE_ENV,
    broker: brokerSettings.url,
    clientId: brokerSettings.clientId,
    detector: detectorSettings.kind,
    devices: detectorSettings.pattern,
    debounceWindowMs: config.DEBOUNCE_WINDOW_MS,
    idleTickMs: config.IDLE_TICK_MS,
  },
  `${APP_NAME} starting`,
);

// =============================================================================
// PIPELINE
// =============================================================================

const topics = buildTopics(discoverySettings.prefix, discoverySettings.nodeId);

log.info({ broker: brokerSettings.url }, "Connecting to MQTT broker...");
const client = connectBroker(brokerSettings);

const publisher = createBrokerPublisher({
  client,
  topics,
  descriptor: buildDiscoveryDescriptor(discoverySettings, topics),
  throttleMs: brokerSettings.throttleMs,
  publishTimeoutMs: brokerSettings.publishTimeoutMs,
});

const coordinator = createCoordinator({
  detector: createDetector(detectorSettings),
  publisher,
  windowMs: config.DEBOUNCE_WINDOW_MS,
  idleTickMs: config.IDLE_TICK_MS,
  introspectionFailurePolicy: config.INTROSPECTION_FAILURE_POLICY,
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    log.info({ signal }, "Shutdown requested");
    coordinator.stop();
  });
}

// =============================================================================
// RUN
// =============================================================================

const result = await coordinator.run();

try {
  await publisher.close();
} catch (error) {
  log.warn({ error }, "MQTT disconnect failed");
}

if (result.isErr()) {
  log.fatal({ error: result.error.type }, formatCoordinatorError(result.error));
  process.exit(1);
}

process.exit(0);
