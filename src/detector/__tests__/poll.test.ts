/**
 * Poll Detector Tests
 *
 * Drives the poll strategy with fake device listing and holder lookup.
 */
import { err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

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

import { introspectionFailed } from "../errors.js";
import { createPollDetector } from "../poll.js";
import type { DeviceLister, ProcessInspector } from "../schema.js";

const oneDevice: DeviceLister = async () => ok(["/dev/video0"]);

describe("Poll Detector", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports ON while a process holds the device and OFF once released", async () => {
    // Arrange
    const inspect = vi
      .fn<ProcessInspector>()
      .mockResolvedValueOnce(ok([4242]))
      .mockResolvedValueOnce(ok([]));
    const detector = createPollDetector({
      pattern: "/dev/video*",
      intervalMs: 5000,
      listDevices: oneDevice,
      inspect,
      now: () => 500,
    });

    // Act
    await detector.start();
    await vi.advanceTimersByTimeAsync(0);
    const first = await detector.next();
    await vi.advanceTimersByTimeAsync(5000);
    const second = await detector.next();

    // Assert
    expect(first._unsafeUnwrap()).toEqual({ state: "ON", observedAt: 500 });
    expect(second._unsafeUnwrap()).toEqual({ state: "OFF", observedAt: 500 });
    expect(inspect).toHaveBeenCalledWith(["/dev/video0"]);
  });

  it("reports OFF without running lsof when no devices match", async () => {
    // Arrange
    const inspect = vi.fn<ProcessInspector>();
    const detector = createPollDetector({
      pattern: "/dev/video*",
      intervalMs: 5000,
      listDevices: async () => ok([]),
      inspect,
      now: () => 9,
    });

    // Act
    await detector.start();
    await vi.advanceTimersByTimeAsync(0);
    const signal = await detector.next();

    // Assert
    expect(signal._unsafeUnwrap()).toEqual({ state: "OFF", observedAt: 9 });
    expect(inspect).not.toHaveBeenCalled();
  });

  it("surfaces a failed lookup and keeps polling", async () => {
    // Arrange
    const inspect = vi
      .fn<ProcessInspector>()
      .mockResolvedValueOnce(err(introspectionFailed("lsof exited with ENOENT")))
      .mockResolvedValueOnce(ok([1]));
    const detector = createPollDetector({
      pattern: "/dev/video*",
      intervalMs: 1000,
      listDevices: oneDevice,
      inspect,
      now: () => 3,
    });

    // Act
    await detector.start();
    await vi.advanceTimersByTimeAsync(0);
    const failed = await detector.next();
    await vi.advanceTimersByTimeAsync(1000);
    const recovered = await detector.next();

    // Assert
    expect(failed._unsafeUnwrapErr()).toEqual({
      type: "INTROSPECTION_FAILED",
      message: "lsof exited with ENOENT",
    });
    expect(recovered._unsafeUnwrap()).toEqual({ state: "ON", observedAt: 3 });
  });

  it("turns a thrown lookup into a failure signal", async () => {
    // Arrange
    const detector = createPollDetector({
      pattern: "/dev/video*",
      intervalMs: 1000,
      listDevices: oneDevice,
      inspect: () => Promise.reject(new Error("boom")),
    });

    // Act
    await detector.start();
    await vi.advanceTimersByTimeAsync(0);
    const failed = await detector.next();

    // Assert
    expect(failed._unsafeUnwrapErr()).toMatchObject({
      type: "INTROSPECTION_FAILED",
      message: "Unexpected poll failure",
    });
  });

  it("stops polling after stop", async () => {
    // Arrange
    const inspect = vi.fn<ProcessInspector>().mockResolvedValue(ok([]));
    const detector = createPollDetector({
      pattern: "/dev/video*",
      intervalMs: 1000,
      listDevices: oneDevice,
      inspect,
    });

    // Act
    await detector.start();
    await vi.advanceTimersByTimeAsync(0);
    await detector.next();
    detector.stop();
    await vi.advanceTimersByTimeAsync(10000);

    // Assert
    expect(inspect).toHaveBeenCalledTimes(1);
  });
});
