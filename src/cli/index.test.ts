import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG_JSON } from "../config";
import { parseCliArgs, runCli } from "./index";

describe("parseCliArgs", () => {
  it("defaults to the download command", () => {
    expect(parseCliArgs([])).toEqual({
      command: "download",
      configPath: undefined,
      initPath: undefined,
      overrides: {
        tags: undefined,
        count: undefined,
        downloadDir: undefined,
        timeoutSeconds: undefined,
        concurrency: undefined,
        ignoreHttpsErrors: undefined,
      },
    });
  });

  it("reads every download flag", () => {
    const parsed = parseCliArgs([
      "--tags",
      "cat solo",
      "--count",
      "25",
      "--dir",
      "out",
      "--timeout",
      "0",
      "--concurrency",
      "4",
      "--ignore-https-errors",
      "--config",
      "conf.json",
    ]);

    expect(parsed).toEqual({
      command: "download",
      configPath: "conf.json",
      initPath: undefined,
      overrides: {
        tags: "cat solo",
        count: 25,
        downloadDir: "out",
        timeoutSeconds: 0,
        concurrency: 4,
        ignoreHttpsErrors: true,
      },
    });
  });

  it("takes the init path as a positional argument", () => {
    expect(parseCliArgs(["init", "my.json"])).toMatchObject({ command: "init", initPath: "my.json" });
    expect(parseCliArgs(["init"])).toMatchObject({ command: "init", initPath: undefined });
  });

  it("returns help for -h and unknown commands", () => {
    expect(parseCliArgs(["-h"])).toBe("help");
    expect(parseCliArgs(["download", "--help"])).toBe("help");
    expect(parseCliArgs(["upload"])).toBe("help");
  });

  it("rejects flags without values and non-integer numbers", () => {
    expect(() => parseCliArgs(["--tags"])).toThrow("--tags requires a value");
    expect(() => parseCliArgs(["--dir", "--count", "3"])).toThrow("--dir requires a value");
    expect(() => parseCliArgs(["--count", "many"])).toThrow('--count must be an integer, got "many"');
  });
});

describe("runCli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "cli-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("prints help and exits 0", async () => {
    await expect(runCli(["--help"])).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^Usage:\n  booru-downloader \[download\] \[options\]/));
  });

  it("writes a config file with init", async () => {
    const target = path.join(dir, "booru.json");

    await expect(runCli(["init", target])).resolves.toBe(0);
    expect(await fs.promises.readFile(target, "utf-8")).toBe(DEFAULT_CONFIG_JSON);
  });

  it("exits 1 when init would overwrite a file", async () => {
    const target = path.join(dir, "booru.json");
    await fs.promises.writeFile(target, "{}");

    await expect(runCli(["init", target])).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(`error: Config file already exists: ${target}`);
  });

  it("exits 1 on an invalid configuration", async () => {
    await expect(runCli(["--count", "3"], { env: {} })).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith("config error: tags must not be empty");
  });

  it("exits 1 on a malformed flag", async () => {
    await expect(runCli(["--count", "lots"], { env: {} })).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith('error: --count must be an integer, got "lots"');
  });
});
