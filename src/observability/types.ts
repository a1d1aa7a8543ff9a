export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  postId?: number;
  path?: string;
  url?: string;
  pid?: number;
  [key: string]: unknown;
}

export type LogWriter = (line: string, level: LogLevel) => void;

export const METRIC_COUNTERS = [
  "posts_fetched",
  "api_pages_fetched",
  "downloads_done",
  "downloads_existed",
  "downloads_failed",
  "bytes_downloaded",
] as const;

export const METRIC_GAUGES = ["peak_concurrency"] as const;

/** Series of samples summarized at the end of a run. Names ending in `_ms` are timers. */
export const METRIC_SERIES = ["api_page_ms", "hash_check_ms", "transfer_ms", "throughput_bps"] as const;

export type MetricCounterName = (typeof METRIC_COUNTERS)[number];
export type MetricGaugeName = (typeof METRIC_GAUGES)[number];
export type MetricSeriesName = (typeof METRIC_SERIES)[number];
export type MetricTimerName = Extract<MetricSeriesName, `${string}_ms`>;
