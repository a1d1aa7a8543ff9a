import fs from "node:fs";
import path from "node:path";
import { Dispatcher } from "undici";
import { fetchPosts } from "../api";
import { AppConfig, DEFAULT_CONFIG_JSON } from "../config";
import { Logger, MetricsRegistry, ProgressStream } from "../observability";
import { runDownload } from "../scheduler";
import { RunSummary } from "../types";
import { ConfigError } from "./errors";

export const FETCHING_MESSAGE = "Fetching image data from Gelbooru API...";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  client: Dispatcher;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  progressStream?: ProgressStream;
}

/**
 * Fetches the posts matching the configured tags and downloads them.
 * Resolves with `undefined` when the query matches nothing.
 */
export async function runDownloadCommand(ctx: CommandContext): Promise<RunSummary | undefined> {
  const { config, logger, metrics } = ctx;
  const credentials =
    config.apiKey !== undefined && config.userId !== undefined
      ? { apiKey: config.apiKey, userId: config.userId }
      : undefined;

  logger.info("api_fetch_start", { tags: config.tags, count: config.count });
  (ctx.progressStream ?? process.stderr).write(`${FETCHING_MESSAGE}\n`);
  const posts = await fetchPosts(
    ctx.client,
    { tags: config.tags, count: config.count, credentials },
    {
      userAgent: config.userAgent,
      signal: ctx.signal,
      logger: logger.child("api"),
      metrics,
    },
  );
  logger.info("api_fetch_complete", { posts: posts.length });

  if (posts.length === 0) {
    console.log(`There is no image found with the given tags: ${config.tags}`);
    return undefined;
  }

  const downloadDir = path.resolve(config.downloadDir);
  logger.info("download_start", { downloadDir, posts: posts.length, concurrency: config.concurrency });
  const summary = await runDownload(posts, downloadDir, ctx.client, {
    logger: logger.child("scheduler"),
    metrics,
    concurrency: config.concurrency,
    userAgent: config.userAgent,
    progressStream: ctx.progressStream,
    signal: ctx.signal,
  });
  logger.info("download_complete", { ...summary.status, durationMs: summary.durationMs });
  return summary;
}

/** Writes a starter config file. Refuses to overwrite an existing one. */
export async function runInit(configPath: string, logger: Logger): Promise<string> {
  const absolutePath = path.resolve(configPath);
  if (fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file already exists: ${absolutePath}`);
  }
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, DEFAULT_CONFIG_JSON, "utf-8");
  logger.info("config_written", { path: absolutePath });
  return absolutePath;
}
