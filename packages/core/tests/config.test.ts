import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConfigError, config, defineConfig, parseEnvConfig } from "../src/index.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("starts from defaults", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("checks.invariants")).toBe("off");
    expect(config.invariantCheckMode()).toBe("off");
    expect(config.has("debug")).toBe(false);
  });

  it("returns undefined for unknown paths", () => {
    expect(config.get("checks.nothing")).toBeUndefined();
    expect(config.get("debug.deeper")).toBeUndefined();
  });

  it("applies programmatic values", () => {
    config.set({ checks: { invariants: "warn" } });
    expect(config.invariantCheckMode()).toBe("warn");
    expect(config.get("debug")).toBe(false);

    config.set({ debug: true });
    expect(config.has("debug")).toBe(true);
    expect(config.invariantCheckMode()).toBe("warn");
  });

  it("reset drops programmatic values", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get("debug")).toBe(false);
  });

  it("lets environment variables win over programmatic values", () => {
    vi.stubEnv("ORDKIT_CHECKS_INVARIANTS", "error");
    config.set({ checks: { invariants: "warn" } });
    expect(config.invariantCheckMode()).toBe("error");
  });

  it("treats unknown invariant modes as off", () => {
    vi.stubEnv("ORDKIT_CHECKS_INVARIANTS", "loud");
    expect(config.get("checks.invariants")).toBe("loud");
    expect(config.invariantCheckMode()).toBe("off");
  });

  it("getAll exposes the merged store", () => {
    config.set({ debug: true });
    expect(config.getAll()).toEqual({ debug: true, checks: { invariants: "off" } });
  });

  it("defineConfig is the identity", () => {
    const c = { checks: { invariants: "error" as const } };
    expect(defineConfig(c)).toBe(c);
  });

  describe("config files", () => {
    let tmpDir: string;
    let originalCwd: string;

    function writeRc(content: string): string {
      fs.writeFileSync(path.join(tmpDir, ".ordkitrc.json"), content);
      return path.join(process.cwd(), ".ordkitrc.json");
    }

    beforeEach(() => {
      originalCwd = process.cwd();
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ordkit-config-"));
      process.chdir(tmpDir);
      config.reset();
    });

    afterEach(() => {
      process.chdir(originalCwd);
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("reports no file when none is present", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.get("debug")).toBe(false);
    });

    it("loads .ordkitrc.json below programmatic values", () => {
      const filepath = writeRc(JSON.stringify({ debug: true, checks: { invariants: "warn" } }));
      expect(config.getConfigFilePath()).toBe(filepath);
      expect(config.get("debug")).toBe(true);
      expect(config.invariantCheckMode()).toBe("warn");

      config.set({ checks: { invariants: "error" } });
      expect(config.invariantCheckMode()).toBe("error");
      expect(config.get("debug")).toBe(true);
    });

    it("lets environment variables win over the file", () => {
      writeRc(JSON.stringify({ debug: true, checks: { invariants: "warn" } }));
      vi.stubEnv("ORDKIT_CHECKS_INVARIANTS", "off");
      expect(config.invariantCheckMode()).toBe("off");
      expect(config.get("debug")).toBe(true);
    });

    it("raises ConfigError for a file that fails to parse", () => {
      const filepath = writeRc("{ not json");
      let caught: unknown;
      try {
        config.get("debug");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught instanceof ConfigError && caught.filepath).toBe(filepath);
      expect(caught instanceof ConfigError && caught.cause).toBeInstanceOf(Error);
      expect(() => config.getConfigFilePath()).toThrow(ConfigError);
    });
  });

  describe("parseEnvConfig", () => {
    it("maps prefixed variables to nested paths", () => {
      expect(
        parseEnvConfig({
          ORDKIT_DEBUG: "1",
          ORDKIT_CHECKS_INVARIANTS: "warn",
          ORDKIT_LIMIT: "42",
          ORDKIT_QUIET: "false",
          PATH: "/usr/bin",
        })
      ).toEqual({
        debug: true,
        checks: { invariants: "warn" },
        limit: 42,
        quiet: false,
      });
    });

    it("ignores everything without the prefix", () => {
      expect(parseEnvConfig({ HOME: "/root", DEBUG: "1" })).toEqual({});
    });
  });
});
