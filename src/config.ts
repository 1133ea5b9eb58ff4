/**
 * Typed configuration - all config lives in the environment (or .env),
 * parsed with Zod at startup. The daemon crashes immediately on invalid
 * config.
 *
 * Covers:
 * - MQTT broker connection
 * - Home Assistant discovery identity
 * - Camera detection strategy and timing
 */
import { z } from "zod";

export const APP_NAME = "camera-sentinel";
export const APP_VERSION = "0.2.0";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const positiveMs = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

export const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Broker
  // ==========================================================================
  MQTT_HOST: z
    .string()
    .trim()
    .min(1, "MQTT_HOST must not be empty")
    .default("localhost")
    .describe("MQTT broker host"),
  MQTT_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(1883)
    .describe("MQTT broker port"),
  MQTT_CLIENT_ID: z
    .string()
    .min(1)
    .default("camera-sentinel")
    .describe("Fixed MQTT client identity"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_KEEP_ALIVE_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(30)
    .describe("MQTT keep-alive interval in seconds"),
  MQTT_RECONNECT_PERIOD_MS: positiveMs(5000).describe(
    "Delay between broker reconnect attempts (ms)",
  ),
  MQTT_THROTTLE_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe("Minimum spacing between outbound publishes (ms)"),
  MQTT_PUBLISH_TIMEOUT_MS: positiveMs(5000).describe(
    "Time to wait for a publish acknowledgement (ms)",
  ),

  // ==========================================================================
  // Home Assistant Discovery
  // ==========================================================================
  DISCOVERY_PREFIX: z
    .string()
    .min(1)
    .default("homeassistant")
    .describe("Home Assistant discovery topic prefix"),
  NODE_ID: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, "NODE_ID may only contain [a-zA-Z0-9_-]")
    .default("officecamera")
    .describe("Node id used in topics and device identifiers"),
  SENSOR_NAME: z.string().min(1).default("OfficeCamera").describe("Entity name"),
  DEVICE_NAME: z
    .string()
    .min(1)
    .default("Office Camera")
    .describe("Device display name"),
  DEVICE_MODEL: z.string().min(1).default("Custom Binary Sensor"),
  DEVICE_MANUFACTURER: z.string().min(1).default(APP_NAME),
  DEVICE_CLASS: z
    .string()
    .min(1)
    .default("connectivity")
    .describe("Home Assistant binary_sensor device class"),

  // ==========================================================================
  // Detection
  // ==========================================================================
  DETECTOR: z
    .enum(["watch", "poll"])
    .default("watch")
    .describe("Detection strategy: inotify watch or lsof poll"),
  DEVICE_GLOB: z
    .string()
    .min(1)
    .default("/dev/video*")
    .describe("Glob pattern matching the capture device nodes"),
  DEBOUNCE_WINDOW_MS: positiveMs(300).describe(
    "Minimum time between confirmed state changes (ms)",
  ),
  IDLE_TICK_MS: positiveMs(5000).describe("Idle loop tick (ms)"),
  POLL_INTERVAL_MS: positiveMs(5000).describe(
    "Interval between lsof polls (poll detector only)",
  ),
  WATCH_RESTART_DELAY_MS: positiveMs(1000).describe(
    "Delay before re-spawning a crashed inotifywait (watch detector only)",
  ),
  INTROSPECTION_FAILURE_POLICY: z
    .enum(["retry", "fatal"])
    .default("retry")
    .describe("What a failed lsof poll does: log and retry, or stop"),
});

export type Config = z.infer<typeof ConfigSchema>;

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config: Config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Broker connection settings for the broker module.
 */
export function getBrokerSettings(source: Config = config): Readonly<{
  url: string;
  clientId: string;
  username: string | undefined;
  password: string | undefined;
  keepAliveSeconds: number;
  reconnectPeriodMs: number;
  throttleMs: number;
  publishTimeoutMs: number;
}> {
  return {
    url: `mqtt://${source.MQTT_HOST}:${source.MQTT_PORT}`,
    clientId: source.MQTT_CLIENT_ID,
    username: source.MQTT_USERNAME,
    password: source.MQTT_PASSWORD,
    keepAliveSeconds: source.MQTT_KEEP_ALIVE_SECONDS,
    reconnectPeriodMs: source.MQTT_RECONNECT_PERIOD_MS,
    throttleMs: source.MQTT_THROTTLE_MS,
    publishTimeoutMs: source.MQTT_PUBLISH_TIMEOUT_MS,
  };
}

/**
 * Identity of the sensor as announced to Home Assistant.
 */
export function getDiscoverySettings(source: Config = config): Readonly<{
  prefix: string;
  nodeId: string;
  sensorName: string;
  deviceName: string;
  model: string;
  manufacturer: string;
  deviceClass: string;
  swVersion: string;
}> {
  return {
    prefix: source.DISCOVERY_PREFIX,
    nodeId: source.NODE_ID,
    sensorName: source.SENSOR_NAME,
    deviceName: source.DEVICE_NAME,
    model: source.DEVICE_MODEL,
    manufacturer: source.DEVICE_MANUFACTURER,
    deviceClass: source.DEVICE_CLASS,
    swVersion: APP_VERSION,
  };
}

/**
 * Detection strategy and timing for the detector module.
 */
export function getDetectorSettings(source: Config = config): Readonly<{
  kind: "watch" | "poll";
  pattern: string;
  pollIntervalMs: number;
  restartDelayMs: number;
}> {
  return {
    kind: source.DETECTOR,
    pattern: source.DEVICE_GLOB,
    pollIntervalMs: source.POLL_INTERVAL_MS,
    restartDelayMs: source.WATCH_RESTART_DELAY_MS,
  };
}
