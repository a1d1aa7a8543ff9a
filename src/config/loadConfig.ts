import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  tags: "",
  count: 10,
  downloadDir: "downloads",
  timeoutSeconds: 30,
  userAgent: "booru-downloader/0.1",
  ignoreHttpsErrors: false,
  logLevel: "info",
};

/** What `init` writes for the user to fill in. */
export const DEFAULT_CONFIG_TEMPLATE: ConfigOverrides = {
  tags: "cat",
  count: 10,
  downloadDir: "downloads",
  timeoutSeconds: 30,
};

export const DEFAULT_CONFIG_JSON = `${JSON.stringify(DEFAULT_CONFIG_TEMPLATE, null, 2)}\n`;

const CONFIG_KEYS: ReadonlyArray<keyof AppConfig> = [
  "tags",
  "count",
  "downloadDir",
  "timeoutSeconds",
  "userAgent",
  "ignoreHttpsErrors",
  "concurrency",
  "apiKey",
  "userId",
  "logLevel",
];

function isConfigKey(key: string): key is keyof AppConfig {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

function readConfigFile(configPath?: string): Record<string, unknown> {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }

  const unknownKeys = Object.keys(parsed).filter((key) => !isConfigKey(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown config keys: ${unknownKeys.join(", ")}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function pickString(source: Record<string, unknown>, key: keyof AppConfig): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${key} must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: keyof AppConfig): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number") {
    throw new ConfigError(`${key} must be a number`);
  }
  return value;
}

function pickBool(source: Record<string, unknown>, key: keyof AppConfig): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${key} must be a boolean`);
  }
  return value;
}

function fromFile(source: Record<string, unknown>): ConfigOverrides {
  const logLevel = pickString(source, "logLevel");
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`logLevel must be one of debug, info, warn, error`);
  }
  return dropUndefined({
    tags: pickString(source, "tags"),
    count: pickNumber(source, "count"),
    downloadDir: pickString(source, "downloadDir"),
    timeoutSeconds: pickNumber(source, "timeoutSeconds"),
    userAgent: pickString(source, "userAgent"),
    ignoreHttpsErrors: pickBool(source, "ignoreHttpsErrors"),
    concurrency: pickNumber(source, "concurrency"),
    apiKey: pickString(source, "apiKey"),
    userId: pickString(source, "userId"),
    logLevel,
  });
}

function toInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function toBool(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return undefined;
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase();
  return dropUndefined({
    tags: env.BOORU_TAGS,
    count: toInt("BOORU_COUNT", env.BOORU_COUNT),
    downloadDir: env.BOORU_DOWNLOAD_DIR,
    timeoutSeconds: toInt("BOORU_TIMEOUT_SECONDS", env.BOORU_TIMEOUT_SECONDS),
    userAgent: env.BOORU_USER_AGENT,
    ignoreHttpsErrors: toBool(env.BOORU_IGNORE_HTTPS_ERRORS),
    concurrency: toInt("BOORU_CONCURRENCY", env.BOORU_CONCURRENCY),
    apiKey: env.BOORU_API_KEY,
    userId: env.BOORU_USER_ID,
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
  });
}

function dropUndefined(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  for (const key of CONFIG_KEYS) {
    if (overrides[key] !== undefined) {
      Object.assign(result, { [key]: overrides[key] });
    }
  }
  return result;
}

/** Throws a {@link ConfigError} naming the first invalid field. */
export function validateConfig(config: AppConfig): AppConfig {
  if (config.tags.trim().length === 0) {
    throw new ConfigError("tags must not be empty");
  }
  if (!Number.isSafeInteger(config.count) || config.count < 1) {
    throw new ConfigError("count must be a positive integer");
  }
  if (config.downloadDir.trim().length === 0) {
    throw new ConfigError("downloadDir must not be empty");
  }
  if (!Number.isSafeInteger(config.timeoutSeconds) || config.timeoutSeconds < 0) {
    throw new ConfigError("timeoutSeconds must be a non-negative integer");
  }
  if (config.concurrency !== undefined && (!Number.isSafeInteger(config.concurrency) || config.concurrency < 1)) {
    throw new ConfigError("concurrency must be a positive integer");
  }
  if ((config.apiKey === undefined) !== (config.userId === undefined)) {
    throw new ConfigError("apiKey and userId must be set together");
  }
  return config;
}

/** Defaults, then the JSON file, then environment variables, then `overrides`. */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile(readConfigFile(configPath)),
    ...fromEnv(env),
    ...dropUndefined(overrides),
  };
  return validateConfig(merged);
}

export { DEFAULT_CONFIG };
