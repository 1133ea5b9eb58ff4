/**
 * Detector Strategy Tests
 */
import { describe, expect, it, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { createDetector } from "../strategy.js";

describe("createDetector", () => {
  it.each(["watch", "poll"] as const)("builds the %s strategy", (kind) => {
    const detector = createDetector({
      kind,
      pattern: "/dev/video*",
      pollIntervalMs: 5000,
      restartDelayMs: 1000,
    });

    expect(detector.kind).toBe(kind);
  });
});
