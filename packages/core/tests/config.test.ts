/**
 * Tests for the layered configuration
 */

import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, defineConfig } from "../src/index.js";
import { __test } from "../src/config.js";

afterEach(() => {
  vi.unstubAllEnvs();
  config.reset();
});

describe("config defaults", () => {
  it("starts with debug disabled", () => {
    expect(config.getBoolean("debug")).toBe(false);
  });

  it("renders missing references as invalid spans", () => {
    expect(config.getChoice("references.onMissing", ["invalid", "empty"] as const, "empty")).toBe(
      "invalid"
    );
  });

  it("fails on malformed style sheets", () => {
    expect(config.get("css.onError")).toBe("fail");
  });
});

describe("config.set", () => {
  it("deep merges programmatic values", () => {
    config.set({ css: { onError: "skip" } });
    expect(config.get("css.onError")).toBe("skip");
    expect(config.get("references.onMissing")).toBe("invalid");
  });

  it("keeps custom keys", () => {
    config.set({ site: { title: "Handbook" } });
    expect(config.get("site.title")).toBe("Handbook");
    expect(config.has("site.title")).toBe(true);
    expect(config.has("site.subtitle")).toBe(false);
  });

});

describe("environment overrides", () => {
  it("parses boolean flags", () => {
    vi.stubEnv("MARKLET_DEBUG", "1");
    expect(config.getBoolean("debug")).toBe(true);
  });

  it("maps lower-cased keys onto camelCase options", () => {
    vi.stubEnv("MARKLET_CSS_ONERROR", "skip");
    expect(config.get("css.onError")).toBe("skip");
  });

  it("falls back when a choice is not allowed", () => {
    vi.stubEnv("MARKLET_CSS_ONERROR", "ignore");
    expect(config.getChoice("css.onError", ["fail", "skip"] as const, "skip")).toBe("skip");
  });

  it("parses digits as numbers and nests on underscores", () => {
    const parsed = __test.loadConfigFromEnv({ MARKLET_LIMITS__DEPTH: "12", OTHER: "x" });
    expect(parsed).toEqual({ limits: { depth: 12 } });
  });

  it("leaves unknown keys as they are", () => {
    const shaped = __test.canonicalKeys({ css: { onerror: "skip" }, extra: true }, __test.defaults());
    expect(shaped).toEqual({ css: { onError: "skip" }, extra: true });
  });
});

describe("config files", () => {
  let dir: string;
  let previousCwd: string;

  beforeEach(() => {
    previousCwd = process.cwd();
    dir = realpathSync(mkdtempSync(join(tmpdir(), "marklet-config-")));
    process.chdir(dir);
    config.reset();
  });

  afterEach(() => {
    process.chdir(previousCwd);
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads .markletrc.json from the working directory", () => {
    writeFileSync(join(dir, ".markletrc.json"), JSON.stringify({ references: { onMissing: "empty" } }));

    expect(config.get("references.onMissing")).toBe("empty");
    expect(config.get("css.onError")).toBe("fail");
    expect(config.getConfigFilePath()).toBe(join(dir, ".markletrc.json"));
  });

  it("reads the marklet key of package.json", () => {
    writeFileSync(
      join(dir, "package.json"),
      JSON.stringify({ name: "handbook", marklet: { css: { onError: "skip" }, site: { title: "Handbook" } } })
    );

    expect(config.get("css.onError")).toBe("skip");
    expect(config.get("site.title")).toBe("Handbook");
    expect(config.getConfigFilePath()).toBe(join(dir, "package.json"));
  });

  it("lets environment variables override the file", () => {
    writeFileSync(join(dir, ".markletrc.json"), JSON.stringify({ css: { onError: "skip" } }));
    vi.stubEnv("MARKLET_CSS_ONERROR", "fail");

    expect(config.get("css.onError")).toBe("fail");
  });

  it("uses the defaults without warnings when no file exists", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(config.get("references.onMissing")).toBe("invalid");
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});

describe("defineConfig", () => {
  it("returns its argument", () => {
    const values = { debug: true };
    expect(defineConfig(values)).toBe(values);
  });
});
