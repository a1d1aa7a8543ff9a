import { AppConfig, ConfigOverrides, loadConfig } from "../config";
import { runDownloadCommand, runInit } from "../core/commands";
import { ConfigError, errorMessage, RunAbortedError } from "../core/errors";
import { createHttpClient } from "../core/http";
import { createRunId, Logger, MetricsRegistry, ProgressStream } from "../observability";

export type CommandName = "download" | "init";

export const DEFAULT_CONFIG_PATH = "booru-downloader.json";
export const EXIT_INTERRUPTED = 130;

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  initPath?: string;
  overrides: ConfigOverrides;
}

export interface RunCliOptions {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  progressStream?: ProgressStream;
}

const HELP_TEXT = `
Usage:
  booru-downloader [download] [options]
  booru-downloader init [path]

Commands:
  download   Fetch posts matching the tags and download them (default)
  init       Write a starter JSON config file (default path: ${DEFAULT_CONFIG_PATH})

Options:
  --config <path>        Path to a JSON config file
  --tags <query>         Tag query, for example "cat rating:general"
  --count <n>            Number of posts to download
  --dir <path>           Download directory
  --timeout <seconds>    Request timeout, 0 disables it
  --concurrency <n>      Parallel downloads (default: available parallelism)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | "help" {
  if (raw === undefined || raw.startsWith("-")) {
    return "download";
  }
  if (raw === "download" || raw === "init") {
    return raw;
  }
  return "help";
}

function readFlag(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${name} requires a value`);
  }
  return value;
}

function readIntFlag(argv: string[], name: string): number | undefined {
  const raw = readFlag(argv, name);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (command === "help") {
    return "help";
  }

  const initPath = command === "init" && argv[1] !== undefined && !argv[1].startsWith("-") ? argv[1] : undefined;
  return {
    command,
    configPath: readFlag(argv, "--config"),
    initPath,
    overrides: {
      tags: readFlag(argv, "--tags"),
      count: readIntFlag(argv, "--count"),
      downloadDir: readFlag(argv, "--dir"),
      timeoutSeconds: readIntFlag(argv, "--timeout"),
      concurrency: readIntFlag(argv, "--concurrency"),
      ignoreHttpsErrors: argv.includes("--ignore-https-errors") ? true : undefined,
    },
  };
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(`error: ${errorMessage(error)}`);
    return 1;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId();
  if (parsed.command === "init") {
    const logger = new Logger({ component: "cli", runId });
    try {
      const written = await runInit(parsed.initPath ?? parsed.configPath ?? DEFAULT_CONFIG_PATH, logger);
      console.log(`Config written to ${written}, edit it and run: booru-downloader --config ${written}`);
      return 0;
    } catch (error) {
      console.error(`error: ${errorMessage(error)}`);
      return 1;
    }
  }

  let config: AppConfig;
  try {
    config = loadConfig(parsed.configPath, parsed.overrides, options.env);
  } catch (error) {
    console.error(`config error: ${errorMessage(error)}`);
    return 1;
  }

  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const client = createHttpClient({ timeoutSeconds: config.timeoutSeconds, ignoreHttpsErrors: config.ignoreHttpsErrors });
  let interrupted = false;

  logger.info("command_start", {
    command: parsed.command,
    tags: config.tags,
    count: config.count,
    downloadDir: config.downloadDir,
    timeoutSeconds: config.timeoutSeconds,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    await runDownloadCommand({
      runId,
      config,
      client,
      logger: logger.child("download"),
      metrics,
      signal: options.signal,
      progressStream: options.progressStream,
    });
    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof RunAbortedError || options.signal?.aborted) {
      interrupted = true;
      console.log("Interrupted, exiting...");
      return EXIT_INTERRUPTED;
    }
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return 1;
  } finally {
    if (interrupted) {
      await client.destroy();
    } else {
      await client.close();
    }
    metrics.printSummary(logger);
  }
}
