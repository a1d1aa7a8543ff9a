import { Logger } from "./logger";
import {
  METRIC_COUNTERS,
  METRIC_GAUGES,
  METRIC_SERIES,
  MetricCounterName,
  MetricGaugeName,
  MetricSeriesName,
  MetricTimerName,
} from "./types";

export type SeriesSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
};

export type MetricsSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  series: Record<string, SeriesSummary>;
};

/** Run-scoped counters, gauges and sample series, logged once when the command ends. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly gauges = new Map<MetricGaugeName, number>();
  private readonly samples = new Map<MetricSeriesName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  setGauge(name: MetricGaugeName, value: number): void {
    this.gauges.set(name, value);
  }

  gauge(name: MetricGaugeName): number {
    return this.gauges.get(name) ?? 0;
  }

  observe(name: MetricSeriesName, value: number): void {
    const values = this.samples.get(name);
    if (values) {
      values.push(value);
    } else {
      this.samples.set(name, [value]);
    }
  }

  /** Starts a timer; calling the result records the elapsed milliseconds and returns them. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const elapsedMs = this.now() - startedAt;
      this.observe(name, elapsedMs);
      return elapsedMs;
    };
  }

  series(name: MetricSeriesName): SeriesSummary {
    const values = this.samples.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }
    const sum = values.reduce((total, value) => total + value, 0);
    return {
      count: values.length,
      min: values.reduce((low, value) => Math.min(low, value)),
      max: values.reduce((high, value) => Math.max(high, value)),
      avg: Math.round((sum / values.length) * 100) / 100,
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(METRIC_COUNTERS.map((name) => [name, this.counter(name)])),
      gauges: Object.fromEntries(METRIC_GAUGES.map((name) => [name, this.gauge(name)])),
      series: Object.fromEntries(METRIC_SERIES.map((name) => [name, this.series(name)])),
    };
  }

  printSummary(logger: Logger): void {
    logger.info("metrics_summary", { ...this.snapshot() });
  }
}
