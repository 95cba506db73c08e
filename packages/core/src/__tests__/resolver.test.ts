import { describe, it, expect, beforeEach } from "vitest";

import { createDefaultConfig } from "../config/defaults.js";
import { mergeConfig } from "../config/merge.js";
import { ConfigResolver } from "../config/resolver.js";
import { CONFIG_SECTIONS } from "../config/types.js";
import { ConfigValidationError } from "../errors.js";
import type { LogContext, Logger } from "../logging/logger.js";

interface Line {
  level: string;
  message: string;
  context?: LogContext;
}

function recordingLogger(lines: Line[]): Logger {
  const push = (level: string) => (message: string, context?: LogContext) => {
    lines.push({ level, message, context });
  };
  return { debug: push("debug"), info: push("info"), warn: push("warn"), error: push("error") };
}

describe("ConfigResolver", () => {
  let now: number;
  let lines: Line[];
  let resolver: ConfigResolver;

  beforeEach(() => {
    now = 1000;
    lines = [];
    resolver = new ConfigResolver({ clock: () => now, logger: recordingLogger(lines) });
  });

  describe("resolve", () => {
    it("returns the default when no context is given", () => {
      expect(resolver.resolve().profileName).toBe("default");
      expect(resolver.resolve(null).profileName).toBe("default");
    });

    it("falls back to the default for unknown contexts", () => {
      expect(resolver.resolve("frame-9")).toEqual(resolver.resolve());
    });

    it("returns an independent copy each time", () => {
      const first = resolver.resolve();
      first.canvas.noiseLevel = 0.9;
      first.navigator.languages.push("fr");
      const second = resolver.resolve();
      expect(second.canvas.noiseLevel).toBe(0.1);
      expect(second.navigator.languages).toEqual(["en-US", "en"]);
    });

    it("resolves a single section", () => {
      resolver.setForContext("ctx-1", mergeConfig(createDefaultConfig(), { audio: { noiseLevel: 0.5 } }));
      expect(resolver.resolveSection("ctx-1", "audio").noiseLevel).toBe(0.5);
      expect(resolver.resolveSection(undefined, "audio").noiseLevel).toBe(0.001);
    });

    it("reports every section as disabled when the whole configuration is off", () => {
      resolver.setForContext("ctx-off", mergeConfig(createDefaultConfig(), { enabled: false }));

      expect(resolver.resolveSection("ctx-off", "canvas").enabled).toBe(false);
      expect(resolver.resolveSection("ctx-off", "antiDetection").enabled).toBe(false);
      expect(resolver.resolveSection("ctx-off", "canvas").noiseLevel).toBe(0.1);
      expect(resolver.resolveSection("ctx-other", "canvas").enabled).toBe(true);
      expect(resolver.resolve("ctx-off").canvas.enabled).toBe(true);
    });
  });

  describe("setForContext", () => {
    it("installs an override for that context only", () => {
      const override = mergeConfig(createDefaultConfig(), { profileName: "ctx-profile" });
      const result = resolver.setForContext("ctx-1", override);
      expect(result.ok).toBe(true);
      expect(resolver.resolve("ctx-1").profileName).toBe("ctx-profile");
      expect(resolver.resolve("ctx-2").profileName).toBe("default");
      expect(resolver.hasOverride("ctx-1")).toBe(true);
      expect(resolver.contexts()).toEqual(["ctx-1"]);
      expect(resolver.size).toBe(1);
    });

    it("leaves a previously resolved copy whole when the override is replaced", () => {
      const before = mergeConfig(createDefaultConfig(), {
        profileName: "before",
        canvas: { noiseLevel: 0.2 },
        audio: { noiseLevel: 0.01 },
      });
      const after = mergeConfig(createDefaultConfig(), {
        profileName: "after",
        canvas: { noiseLevel: 0.6, addNoise: false },
        webgl: { vendor: "Other Vendor" },
        audio: { noiseLevel: 0.05 },
        screen: { width: 1280, height: 720 },
      });
      resolver.setForContext("ctx-1", before);
      const held = resolver.resolve("ctx-1");

      resolver.setForContext("ctx-1", after);
      const fresh = resolver.resolve("ctx-1");

      for (const section of CONFIG_SECTIONS) {
        expect(held[section]).toEqual(before[section]);
        expect(fresh[section]).toEqual(after[section]);
      }
      expect(held.profileName).toBe("before");
      expect(fresh.profileName).toBe("after");
    });

    it("keeps the stored value independent of the caller's object", () => {
      const override = createDefaultConfig();
      resolver.setForContext("ctx-1", override);
      override.canvas.noiseLevel = 0.7;
      expect(resolver.resolve("ctx-1").canvas.noiseLevel).toBe(0.1);
    });

    it("rejects a noise level of 1.5 and keeps the previous override", () => {
      const good = mergeConfig(createDefaultConfig(), { canvas: { noiseLevel: 0.2 } });
      resolver.setForContext("ctx-1", good);

      const bad = mergeConfig(createDefaultConfig(), { canvas: { noiseLevel: 1.5 } });
      const result = resolver.setForContext("ctx-1", bad);

      expect(result).toEqual({
        ok: false,
        errors: ["Canvas noise level must be between 0.0 and 1.0"],
      });
      expect(resolver.resolve("ctx-1").canvas.noiseLevel).toBe(0.2);
      expect(lines.filter((l) => l.level === "error")).toEqual([
        {
          level: "error",
          message: "Rejected configuration",
          context: { contextId: "ctx-1", errors: ["Canvas noise level must be between 0.0 and 1.0"] },
        },
      ]);
    });

    it("rejects without creating an override", () => {
      resolver.setForContext("ctx-1", { profileName: "partial" });
      expect(resolver.hasOverride("ctx-1")).toBe(false);
    });
  });

  describe("removeForContext", () => {
    it("is idempotent", () => {
      resolver.setForContext("ctx-1", createDefaultConfig());
      expect(resolver.removeForContext("ctx-1")).toBe(true);
      expect(resolver.removeForContext("ctx-1")).toBe(false);
      expect(resolver.hasOverride("ctx-1")).toBe(false);
    });
  });

  describe("setDefault / updateDefault", () => {
    it("stamps updatedAt from the clock", () => {
      now = 5000;
      const result = resolver.setDefault(createDefaultConfig(() => 1));
      expect(result.ok).toBe(true);
      expect(resolver.resolve().updatedAt).toBe(5000);
      expect(resolver.resolve().createdAt).toBe(1);
    });

    it("leaves the default untouched on rejection", () => {
      const bad = createDefaultConfig();
      bad.profileName = "";
      expect(resolver.setDefault(bad).ok).toBe(false);
      expect(resolver.resolve().profileName).toBe("default");
    });

    it("merges a patch over the current default", () => {
      now = 2000;
      const result = resolver.updateDefault({ webgl: { vendor: "Test Vendor" } });
      expect(result.ok).toBe(true);
      const config = resolver.resolve();
      expect(config.webgl.vendor).toBe("Test Vendor");
      expect(config.webgl.renderer).toBe(createDefaultConfig().webgl.renderer);
      expect(config.updatedAt).toBe(2000);
    });

    it("rejects a patch that produces an invalid config", () => {
      const result = resolver.updateDefault({ audio: { noiseLevel: 3 } });
      expect(result).toEqual({ ok: false, errors: ["Audio noise level must be between 0.0 and 1.0"] });
      expect(resolver.resolve().audio.noiseLevel).toBe(0.001);
    });

    it("does not affect existing overrides", () => {
      resolver.setForContext("ctx-1", createDefaultConfig());
      resolver.updateDefault({ profileName: "changed" });
      expect(resolver.resolve("ctx-1").profileName).toBe("default");
      expect(resolver.resolve().profileName).toBe("changed");
    });
  });

  describe("construction", () => {
    it("throws for an invalid initial default", () => {
      const bad = createDefaultConfig();
      bad.canvas.noiseLevel = 1.5;
      expect(() => new ConfigResolver({ defaultConfig: bad })).toThrow(ConfigValidationError);
    });

    it("stamps the built-in default from the clock", () => {
      const r = new ConfigResolver({ clock: () => 42 });
      expect(r.resolve().createdAt).toBe(42);
    });
  });

  it("clear drops every override but keeps the default", () => {
    resolver.setForContext("a", createDefaultConfig());
    resolver.setForContext("b", createDefaultConfig());
    resolver.updateDefault({ profileName: "kept" });
    resolver.clear();
    expect(resolver.size).toBe(0);
    expect(resolver.resolve("a").profileName).toBe("kept");
  });
});
