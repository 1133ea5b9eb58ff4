/**
 * Detector Transform Tests
 *
 * Tests for inotifywait/lsof parsing and argument construction.
 */
import { describe, expect, it } from "vitest";

import {
  buildInotifyArgs,
  buildLsofArgs,
  interpretLsofExit,
  isWatchReadyLine,
  parseLsofOutput,
  parseWatchLine,
  stateFromHolders,
} from "../transform.js";

describe("Detector Transform", () => {
  // ===========================================================================
  // inotifywait
  // ===========================================================================

  describe("buildInotifyArgs", () => {
    it("monitors open and close on every device with a path-first format", () => {
      expect(buildInotifyArgs(["/dev/video0", "/dev/video1"])).toEqual([
        "-m",
        "-e",
        "open",
        "-e",
        "close",
        "--format",
        "%w %e",
        "/dev/video0",
        "/dev/video1",
      ]);
    });
  });

  describe("isWatchReadyLine", () => {
    it("recognizes the established message", () => {
      expect(isWatchReadyLine("Watches established.")).toBe(true);
    });

    it("ignores the setup message", () => {
      expect(isWatchReadyLine("Setting up watches.")).toBe(false);
    });
  });

  describe("parseWatchLine", () => {
    it("maps OPEN to ON", () => {
      expect(parseWatchLine("/dev/video0 OPEN")).toEqual({
        device: "/dev/video0",
        state: "ON",
      });
    });

    it("maps CLOSE_NOWRITE,CLOSE to OFF", () => {
      expect(parseWatchLine("/dev/video0 CLOSE_NOWRITE,CLOSE")).toEqual({
        device: "/dev/video0",
        state: "OFF",
      });
    });

    it("maps CLOSE_WRITE,CLOSE to OFF", () => {
      expect(parseWatchLine("/dev/video2 CLOSE_WRITE,CLOSE")).toEqual({
        device: "/dev/video2",
        state: "OFF",
      });
    });

    it("tolerates trailing whitespace", () => {
      expect(parseWatchLine("/dev/video0 OPEN  \n")).toEqual({
        device: "/dev/video0",
        state: "ON",
      });
    });

    it("ignores events other than open and close", () => {
      expect(parseWatchLine("/dev/video0 DELETE_SELF")).toBeNull();
      expect(parseWatchLine("/dev/video0 IGNORED")).toBeNull();
    });

    it("ignores lines without an event", () => {
      expect(parseWatchLine("")).toBeNull();
      expect(parseWatchLine("OPEN")).toBeNull();
    });
  });

  // ===========================================================================
  // lsof
  // ===========================================================================

  describe("buildLsofArgs", () => {
    it("asks for terse PID output", () => {
      expect(buildLsofArgs(["/dev/video0"])).toEqual(["-t", "/dev/video0"]);
    });
  });

  describe("parseLsofOutput", () => {
    it("parses one PID per line", () => {
      expect(parseLsofOutput("1234\n5678\n")).toEqual([1234, 5678]);
    });

    it("returns empty list for empty output", () => {
      expect(parseLsofOutput("")).toEqual([]);
    });

    it("skips lines that are not PIDs", () => {
      expect(parseLsofOutput("lsof: WARNING: can't stat()\n42\n")).toEqual([42]);
    });
  });

  describe("interpretLsofExit", () => {
    it("treats a clean exit as a list of holders", () => {
      const result = interpretLsofExit(null, "101\n");

      expect(result._unsafeUnwrap()).toEqual([101]);
    });

    it("treats exit status 1 with no output as no holders", () => {
      const result = interpretLsofExit(1, "");

      expect(result._unsafeUnwrap()).toEqual([]);
    });

    it("keeps holders reported alongside exit status 1", () => {
      const result = interpretLsofExit(1, "202\n");

      expect(result._unsafeUnwrap()).toEqual([202]);
    });

    it("fails when lsof cannot be run", () => {
      const cause = new Error("spawn lsof ENOENT");

      const result = interpretLsofExit("ENOENT", "", cause);

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INTROSPECTION_FAILED",
        message: "lsof exited with ENOENT",
        cause,
      });
    });

    it("fails on other exit statuses", () => {
      const result = interpretLsofExit(2, "");

      expect(result._unsafeUnwrapErr().type).toBe("INTROSPECTION_FAILED");
    });
  });

  describe("stateFromHolders", () => {
    it("is ON when any process holds a device", () => {
      expect(stateFromHolders([99])).toBe("ON");
    });

    it("is OFF when nobody holds a device", () => {
      expect(stateFromHolders([])).toBe("OFF");
    });
  });
});
