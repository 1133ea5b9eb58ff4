/**
 * Config Tests
 *
 * Schema defaults, validation and the derived settings objects.
 */
import { describe, expect, it } from "vitest";

import {
  ConfigSchema,
  getBrokerSettings,
  getDetectorSettings,
  getDiscoverySettings,
} from "../config.js";

describe("Config", () => {
  it("applies defaults to an empty environment", () => {
    const config = ConfigSchema.parse({});

    expect(config).toMatchObject({
      NODE_ENV: "development",
      MQTT_HOST: "localhost",
      MQTT_PORT: 1883,
      MQTT_CLIENT_ID: "camera-sentinel",
      DISCOVERY_PREFIX: "homeassistant",
      NODE_ID: "officecamera",
      DETECTOR: "watch",
      DEVICE_GLOB: "/dev/video*",
      DEBOUNCE_WINDOW_MS: 300,
      IDLE_TICK_MS: 5000,
      INTROSPECTION_FAILURE_POLICY: "retry",
    });
    expect(config.MQTT_USERNAME).toBeUndefined();
  });

  it("coerces numeric strings", () => {
    const config = ConfigSchema.parse({
      MQTT_PORT: "8883",
      DEBOUNCE_WINDOW_MS: "500",
    });

    expect(config.MQTT_PORT).toBe(8883);
    expect(config.DEBOUNCE_WINDOW_MS).toBe(500);
  });

  it.each([
    ["MQTT_PORT", "70000"],
    ["DETECTOR", "fanotify"],
    ["NODE_ID", "office camera"],
    ["DEBOUNCE_WINDOW_MS", "0"],
    ["MQTT_HOST", "  "],
  ])("rejects %s=%s", (key, value) => {
    expect(ConfigSchema.safeParse({ [key]: value }).success).toBe(false);
  });

  it("treats blank credentials as absent", () => {
    const config = ConfigSchema.parse({ MQTT_USERNAME: "  ", MQTT_PASSWORD: "" });

    expect(config.MQTT_USERNAME).toBeUndefined();
    expect(config.MQTT_PASSWORD).toBeUndefined();
  });

  it("derives the settings objects", () => {
    const config = ConfigSchema.parse({
      MQTT_HOST: "broker.lan",
      MQTT_PORT: "1884",
      MQTT_USERNAME: "sentinel",
      MQTT_PASSWORD: "test-secret",
      DETECTOR: "poll",
      NODE_ID: "desk_cam",
    });

    expect(getBrokerSettings(config)).toMatchObject({
      url: "mqtt://broker.lan:1884",
      username: "sentinel",
      password: "test-secret",
    });
    expect(getDetectorSettings(config)).toEqual({
      kind: "poll",
      pattern: "/dev/video*",
      pollIntervalMs: 5000,
      restartDelayMs: 1000,
    });
    expect(getDiscoverySettings(config)).toMatchObject({
      prefix: "homeassistant",
      nodeId: "desk_cam",
      manufacturer: "camera-sentinel",
      swVersion: "0.2.0",
    });
  });
});
