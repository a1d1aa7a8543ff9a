import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { DEFAULT_CONFIG, DEFAULT_CONFIG_JSON, loadConfig, validateConfig } from "./loadConfig";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: unknown): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, typeof contents === "string" ? contents : JSON.stringify(contents));
    return file;
  }

  it("applies defaults under the given overrides", () => {
    const config = loadConfig(undefined, { tags: "cat" }, {});

    expect(config).toEqual({ ...DEFAULT_CONFIG, tags: "cat" });
  });

  it("layers file, environment and overrides in that order", () => {
    const file = writeConfig({ tags: "from-file", count: 5, downloadDir: "file-dir", timeoutSeconds: 10 });

    const config = loadConfig(
      file,
      { count: 7 },
      { BOORU_COUNT: "6", BOORU_DOWNLOAD_DIR: "env-dir", BOORU_IGNORE_HTTPS_ERRORS: "true", LOG_LEVEL: "DEBUG" },
    );

    expect(config.tags).toBe("from-file");
    expect(config.count).toBe(7);
    expect(config.downloadDir).toBe("env-dir");
    expect(config.timeoutSeconds).toBe(10);
    expect(config.ignoreHttpsErrors).toBe(true);
    expect(config.logLevel).toBe("debug");
  });

  it("ignores overrides left undefined", () => {
    const file = writeConfig({ tags: "cat", count: 3 });

    expect(loadConfig(file, { count: undefined }, {}).count).toBe(3);
  });

  it("accepts the config written by init", () => {
    const file = writeConfig(DEFAULT_CONFIG_JSON);

    expect(loadConfig(file, {}, {})).toMatchObject({ tags: "cat", count: 10, downloadDir: "downloads", timeoutSeconds: 30 });
  });

  it("rejects a missing file", () => {
    const missing = path.join(dir, "missing.json");

    expect(() => loadConfig(missing, {}, {})).toThrow(`Config file not found: ${missing}`);
  });

  it("rejects invalid JSON, non-object roots and unknown keys", () => {
    expect(() => loadConfig(writeConfig("{ nope"), {}, {})).toThrow(ConfigError);
    expect(() => loadConfig(writeConfig("[]"), {}, {})).toThrow("Config file must contain a JSON object");
    expect(() => loadConfig(writeConfig({ tags: "cat", colour: "red" }), {}, {})).toThrow(
      "Unknown config keys: colour",
    );
  });

  it("rejects fields of the wrong type", () => {
    expect(() => loadConfig(writeConfig({ tags: 1 }), {}, {})).toThrow("tags must be a string");
    expect(() => loadConfig(writeConfig({ tags: "cat", count: "10" }), {}, {})).toThrow("count must be a number");
    expect(() => loadConfig(writeConfig({ tags: "cat", logLevel: "loud" }), {}, {})).toThrow(
      "logLevel must be one of debug, info, warn, error",
    );
  });

  it("rejects non-integer environment values", () => {
    expect(() => loadConfig(undefined, { tags: "cat" }, { BOORU_COUNT: "ten" })).toThrow(
      'BOORU_COUNT must be an integer, got "ten"',
    );
  });

  it("reads credentials from the environment", () => {
    const config = loadConfig(undefined, { tags: "cat" }, { BOORU_API_KEY: "test-secret", BOORU_USER_ID: "42" });

    expect(config.apiKey).toBe("test-secret");
    expect(config.userId).toBe("42");
  });
});

describe("validateConfig", () => {
  const valid = { ...DEFAULT_CONFIG, tags: "cat" };

  it("accepts a valid config", () => {
    expect(validateConfig(valid)).toEqual(valid);
  });

  it.each([
    [{ tags: "  " }, "tags must not be empty"],
    [{ count: 0 }, "count must be a positive integer"],
    [{ count: 1.5 }, "count must be a positive integer"],
    [{ downloadDir: "" }, "downloadDir must not be empty"],
    [{ timeoutSeconds: -1 }, "timeoutSeconds must be a non-negative integer"],
    [{ concurrency: 0 }, "concurrency must be a positive integer"],
    [{ apiKey: "test-secret" }, "apiKey and userId must be set together"],
  ])("rejects %o", (patch, message) => {
    expect(() => validateConfig({ ...valid, ...patch })).toThrow(message);
  });

  it("allows a zero timeout", () => {
    expect(validateConfig({ ...valid, timeoutSeconds: 0 }).timeoutSeconds).toBe(0);
  });
});
