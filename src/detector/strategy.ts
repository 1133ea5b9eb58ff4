import { createPollDetector } from "./poll.js";
import type { DetectorSettings, StateDetector } from "./schema.js";
import { createWatchDetector } from "./watch.js";

/**
 * Build the configured detector. The watch strategy is preferred; poll is the
 * fallback for hosts without inotifywait and misses opens shorter than the
 * interval.
 */
export function createDetector(settings: DetectorSettings): StateDetector {
  switch (settings.kind) {
    case "watch":
      return createWatchDetector({
        pattern: settings.pattern,
        restartDelayMs: settings.restartDelayMs,
      });
    case "poll":
      return createPollDetector({
        pattern: settings.pattern,
        intervalMs: settings.pollIntervalMs,
      });
  }
}
