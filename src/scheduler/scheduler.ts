import fs from "node:fs";
import path from "node:path";
import { Dispatcher } from "undici";
import { errorCode, errorMessage, InvariantViolationError, RunAbortedError, TaskFaultError } from "../core/errors";
import { ByteCounter, DownloadError, transferFile } from "../download";
import { isExistingFile } from "../hash";
import { createRunId, Logger, MetricsRegistry, ProgressDisplay, ProgressStream } from "../observability";
import { AggregateStatus, DownloadOutcome, PostRecord, RunSummary } from "../types";
import { Channel } from "./channel";
import { ConcurrencyLimiter, resolveParallelism } from "./limiter";
import { SpeedSampler } from "./speedSampler";

export const TAG_FILE_EXTENSION = ".txt";

export interface SchedulerOptions {
  client: Dispatcher;
  downloadDir: string;
  posts: PostRecord[];
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** Permit pool size. Defaults to the host parallelism. */
  concurrency?: number;
  speedIntervalMs?: number;
  progressStream?: ProgressStream;
  userAgent?: string;
  transferFn?: typeof transferFile;
  existingFileFn?: typeof isExistingFile;
}

/** A per-item failure: which step failed, for which path, and why. */
export class ItemFailureError extends Error {
  constructor(context: string, cause: unknown) {
    super(`${context}: ${errorMessage(cause)}`, { cause });
    this.name = "ItemFailureError";
  }
}

type TaskMessage =
  | { kind: "outcome"; post: PostRecord; outcome: DownloadOutcome }
  | { kind: "failure"; post: PostRecord; error: ItemFailureError }
  | { kind: "fault"; post: PostRecord; error: unknown };

export function isExpectedItemError(error: unknown): boolean {
  if (error instanceof InvariantViolationError) {
    return false;
  }
  return error instanceof DownloadError || errorCode(error) !== undefined;
}

/** `downloads/123.jpg` becomes `downloads/123.txt`. */
export function tagFilePath(filePath: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${TAG_FILE_EXTENSION}`);
}

/** `"a b c"` becomes `"a, b, c"`. */
export function formatTags(tags: string): string {
  return tags.replaceAll(" ", ", ");
}

async function step<T>(context: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (isExpectedItemError(error)) {
      throw new ItemFailureError(context, error);
    }
    throw error;
  }
}

/**
 * Downloads every post into `downloadDir`, skipping files whose content hash
 * already matches, and writes a tag file beside each downloaded file.
 *
 * At most `concurrency` items are worked on at once. Item failures are printed
 * and counted; they never reject `launch`. A task that faults in any other way
 * rejects the whole run with {@link TaskFaultError}.
 */
export class Scheduler {
  private readonly client: Dispatcher;
  private readonly downloadDir: string;
  private readonly posts: PostRecord[];
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly concurrency: number;
  private readonly speedIntervalMs?: number;
  private readonly progressStream?: ProgressStream;
  private readonly headers?: Record<string, string>;
  private readonly transferFn: typeof transferFile;
  private readonly existingFileFn: typeof isExistingFile;

  private constructor(options: SchedulerOptions) {
    this.client = options.client;
    this.downloadDir = options.downloadDir;
    this.posts = options.posts;
    this.logger = options.logger ?? new Logger({ component: "scheduler", runId: createRunId() });
    this.metrics = options.metrics ?? new MetricsRegistry();
    this.concurrency = options.concurrency ?? resolveParallelism();
    this.speedIntervalMs = options.speedIntervalMs;
    this.progressStream = options.progressStream;
    this.headers = options.userAgent ? { "user-agent": options.userAgent } : undefined;
    this.transferFn = options.transferFn ?? transferFile;
    this.existingFileFn = options.existingFileFn ?? isExistingFile;
  }

  /** Creates the download directory; rejects if that fails. */
  static async build(options: SchedulerOptions): Promise<Scheduler> {
    await fs.promises.mkdir(options.downloadDir, { recursive: true });
    return new Scheduler(options);
  }

  async launch(signal?: AbortSignal): Promise<RunSummary> {
    if (signal?.aborted) {
      throw new RunAbortedError(signal.reason);
    }

    const startedAt = Date.now();
    const total = this.posts.length;
    const display = new ProgressDisplay(total, { stream: this.progressStream });
    const logger = this.logger.withWriter((line) => display.println(line));
    const counter = new ByteCounter();
    const limiter = new ConcurrencyLimiter(this.concurrency);
    const channel = new Channel<TaskMessage>();
    const controller = new AbortController();

    const onAbort = (): void => {
      limiter.clearQueue();
      controller.abort(signal?.reason);
      channel.fail(new RunAbortedError(signal?.reason));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    display.start();
    for (const post of this.posts) {
      void limiter.run(() => this.runItem(post, counter, controller.signal)).then(
        (outcome) => channel.send({ kind: "outcome", post, outcome }),
        (error: unknown) =>
          channel.send(
            error instanceof ItemFailureError ? { kind: "failure", post, error } : { kind: "fault", post, error },
          ),
      );
    }
    logger.debug("tasks_arranged", { total, concurrency: limiter.capacity, queued: limiter.pending });

    const sampler = new SpeedSampler(counter, display.observe(), {
      intervalMs: this.speedIntervalMs,
      onRate: (rate) => this.metrics.observe("throughput_bps", rate),
    });
    const sampling = sampler.run();

    let status: AggregateStatus;
    try {
      status = await this.aggregate(channel, display, total);
    } catch (error) {
      limiter.clearQueue();
      controller.abort(error);
      throw error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      display.finish();
      await sampling;
      this.metrics.incrementCounter("bytes_downloaded", sampler.totalBytes + counter.drain());
      this.metrics.setGauge("peak_concurrency", limiter.peak);
      counter.close();
    }

    const summary: RunSummary = {
      status,
      total,
      peakConcurrency: limiter.peak,
      durationMs: Date.now() - startedAt,
    };
    this.logger.info("run_complete", { ...summary });
    return summary;
  }

  private async aggregate(channel: Channel<TaskMessage>, display: ProgressDisplay, total: number): Promise<AggregateStatus> {
    const status: AggregateStatus = { done: 0, existed: 0, failed: 0 };

    for (let received = 0; received < total; received += 1) {
      const message = await channel.receive();
      switch (message.kind) {
        case "outcome":
          if (message.outcome === "done") {
            status.done += 1;
            this.metrics.incrementCounter("downloads_done", 1);
          } else {
            status.existed += 1;
            this.metrics.incrementCounter("downloads_existed", 1);
          }
          break;
        case "failure":
          status.failed += 1;
          this.metrics.incrementCounter("downloads_failed", 1);
          display.println(message.error.message);
          break;
        case "fault":
          throw new TaskFaultError(path.join(this.downloadDir, message.post.filename), message.error);
      }

      display.setStatus(status);
      display.inc(1);
    }

    return status;
  }

  private async runItem(post: PostRecord, counter: ByteCounter, signal: AbortSignal): Promise<DownloadOutcome> {
    const filePath = path.join(this.downloadDir, post.filename);

    const stopHashTimer = this.metrics.startTimer("hash_check_ms");
    let existed: boolean;
    try {
      existed = await step(`Failed to check existing file: ${filePath}`, () => this.existingFileFn(filePath, post.md5));
    } finally {
      stopHashTimer();
    }
    if (existed) {
      return "existed";
    }

    const stopTransferTimer = this.metrics.startTimer("transfer_ms");
    try {
      await step(`Failed to download: ${filePath}`, () =>
        this.transferFn({
          client: this.client,
          url: post.fileUrl,
          destination: filePath,
          counter,
          signal,
          headers: this.headers,
        }),
      );
    } finally {
      stopTransferTimer();
    }

    const tagPath = tagFilePath(filePath);
    await step(`Failed to write tags: ${tagPath}`, () => fs.promises.writeFile(tagPath, formatTags(post.tags), "utf-8"));

    return "done";
  }
}

export interface RunDownloadOptions extends Omit<SchedulerOptions, "client" | "downloadDir" | "posts"> {
  signal?: AbortSignal;
}

/** Builds a {@link Scheduler} and runs it to completion. */
export async function runDownload(
  posts: PostRecord[],
  downloadDir: string,
  client: Dispatcher,
  options: RunDownloadOptions = {},
): Promise<RunSummary> {
  const { signal, ...rest } = options;
  const scheduler = await Scheduler.build({ ...rest, client, downloadDir, posts });
  return scheduler.launch(signal);
}
