/**
 * Coordinator Module - Public API
 */

// Types
export type {
  Coordinator,
  CoordinatorOptions,
  CoordinatorState,
  IntrospectionFailurePolicy,
} from "./schema.js";

// Errors
export type { CoordinatorError } from "./errors.js";
export { formatCoordinatorError } from "./errors.js";

// Service functions
export { createCoordinator } from "./service.js";

// Pure transformations (for testing)
export type { LogLevel } from "./transform.js";
export {
  brokerEventLevel,
  describeBrokerEvent,
  idleTickDelay,
  isFatalDetectorError,
  rotateSources,
} from "./transform.js";
