// @vitest-environment node
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@/lib/errors";
import { loadConfig, parseConfig, refreshIntervalMs } from "./loader";

describe("parseConfig", () => {
  it("fills defaults for missing keys", () => {
    const config = parseConfig({ plugins: [{ webhook: "https://example.test/hook" }] });

    expect(config.refresh_rate).toBe(600);
    expect(config.anki_connect_url).toBe("http://127.0.0.1:8765");
    expect(config.plugins).toEqual([
      {
        enabled: true,
        search_query: "deck:current",
        visible_fields: [],
        webhook: "https://example.test/hook",
      },
    ]);
  });

  it("clamps the refresh rate to 300 seconds", () => {
    const config = parseConfig({ refresh_rate: 10 });
    expect(config.refresh_rate).toBe(300);
    expect(refreshIntervalMs(config)).toBe(300_000);
  });

  it("clamps a negative refresh rate instead of rejecting it", () => {
    expect(parseConfig({ refresh_rate: -5 }).refresh_rate).toBe(300);
    expect(parseConfig({ refresh_rate: "-5" }).refresh_rate).toBe(300);
  });

  it("accepts the refresh rate as a string", () => {
    expect(parseConfig({ refresh_rate: "900" }).refresh_rate).toBe(900);
    expect(parseConfig({ refresh_rate: " 45 " }).refresh_rate).toBe(300);
  });

  it("rejects a non-numeric refresh rate", () => {
    expect(() => parseConfig({ refresh_rate: "often" })).toThrow(ConfigError);
  });

  it("names the offending key", () => {
    const error = (() => {
      try {
        parseConfig({ plugins: [{ visible_fields: "Word" }] });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ field: "plugins.0.visible_fields", value: "Word" });
    expect(String(error)).toMatch(/\(plugins\.0\.visible_fields: Word\)$/);
  });

  it("carries the rejected refresh rate on the error", () => {
    const error = (() => {
      try {
        parseConfig({ refresh_rate: "often" });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ field: "refresh_rate", value: "often" });
  });

  it("returns a frozen snapshot", () => {
    const config = parseConfig({
      plugins: [{ visible_fields: ["Word"], webhook: "https://example.test/hook" }],
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.plugins)).toBe(true);
    expect(Object.isFrozen(config.plugins[0])).toBe(true);
    expect(Object.isFrozen(config.plugins[0].visible_fields)).toBe(true);
  });

  it("keeps the AnkiConnect key only when set", () => {
    expect(parseConfig({}).anki_connect_key).toBeUndefined();
    expect(parseConfig({ anki_connect_key: "test-secret" }).anki_connect_key).toBe("test-secret");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "notecast-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and validates the config file", async () => {
    const path = join(dir, "config.json");
    await writeFile(
      path,
      JSON.stringify({
        refresh_rate: "1200",
        plugins: [
          {
            enabled: false,
            search_query: "deck:Japanese",
            visible_fields: ["Word", "Meaning"],
            webhook: "https://example.test/hook",
          },
        ],
      }),
    );

    const config = await loadConfig(path);
    expect(config.refresh_rate).toBe(1200);
    expect(config.plugins[0]).toEqual({
      enabled: false,
      search_query: "deck:Japanese",
      visible_fields: ["Word", "Meaning"],
      webhook: "https://example.test/hook",
    });
  });

  it("reports invalid JSON as a ConfigError", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, "{ refresh_rate: ");

    await expect(loadConfig(path)).rejects.toThrow("Config file is not valid JSON");
  });

  it("reports a missing file as a ConfigError", async () => {
    await expect(loadConfig(join(dir, "missing.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});
