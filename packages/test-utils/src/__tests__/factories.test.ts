import { describe, it, expect, beforeEach } from "vitest";

import { validateConfig } from "@veilprint/core";

import { channel, gradientRgba, solidRgba } from "../buffers.js";
import { ManualClock } from "../clock.js";
import {
  FIXTURE_TIME,
  createDeviceProfile,
  createTestConfig,
  nextContextId,
  resetIdCounter,
} from "../factories.js";
import { createRecordingLogger } from "../logger.js";

describe("test factories", () => {
  beforeEach(() => {
    resetIdCounter();
  });

  describe("createTestConfig", () => {
    it("creates a valid default config with pinned timestamps", () => {
      const config = createTestConfig();
      expect(config.createdAt).toBe(FIXTURE_TIME);
      expect(config.updatedAt).toBe(FIXTURE_TIME);
      expect(validateConfig(config).ok).toBe(true);
    });

    it("merges section overrides", () => {
      const config = createTestConfig({ canvas: { noiseLevel: 0.5 } });
      expect(config.canvas.noiseLevel).toBe(0.5);
      expect(config.canvas.addNoise).toBe(true);
    });
  });

  describe("ids", () => {
    it("increments and resets", () => {
      expect(nextContextId()).toBe("test-ctx-1");
      expect(nextContextId("frame")).toBe("frame-2");
      resetIdCounter();
      expect(nextContextId()).toBe("test-ctx-1");
    });

    it("names device profiles from the counter", () => {
      expect(createDeviceProfile().name).toBe("profile-1");
      expect(createDeviceProfile({ name: "custom" }).name).toBe("custom");
    });
  });

  describe("ManualClock", () => {
    it("advances only when told to", () => {
      const clock = new ManualClock(100);
      const now = clock.now;
      expect(now()).toBe(100);
      expect(clock.advance(50)).toBe(150);
      expect(now()).toBe(150);
      clock.set(7);
      expect(now()).toBe(7);
    });
  });

  describe("createRecordingLogger", () => {
    it("records entries in order", () => {
      const logger = createRecordingLogger();
      logger.info("first");
      logger.warn("second", { name: "x" });
      expect(logger.entries).toEqual([
        { level: "info", message: "first" },
        { level: "warn", message: "second", context: { name: "x" } },
      ]);
      expect(logger.messages("warn")).toEqual(["second"]);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("buffers", () => {
    it("fills a solid buffer", () => {
      const buffer = solidRgba(2, 1, [10, 20, 30, 40]);
      expect(Array.from(buffer)).toEqual([10, 20, 30, 40, 10, 20, 30, 40]);
    });

    it("builds a gradient with opaque alpha", () => {
      const buffer = gradientRgba(3, 2);
      expect(channel(buffer, 0)).toEqual([0, 128, 255, 0, 128, 255]);
      expect(channel(buffer, 1)).toEqual([0, 0, 0, 255, 255, 255]);
      expect(channel(buffer, 3)).toEqual([255, 255, 255, 255, 255, 255]);
    });
  });
});
