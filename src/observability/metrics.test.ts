import { describe, expect, it } from "vitest";
import { Logger } from "./logger";
import { MetricsRegistry } from "./metrics";

describe("MetricsRegistry", () => {
  it("accumulates counters and starts every counter at zero", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("downloads_done");
    metrics.incrementCounter("bytes_downloaded", 2048);
    metrics.incrementCounter("bytes_downloaded", 1024);

    expect(metrics.counter("downloads_done")).toBe(1);
    expect(metrics.counter("bytes_downloaded")).toBe(3072);
    expect(metrics.counter("downloads_failed")).toBe(0);
  });

  it("records timer durations into a series summary", () => {
    let clock = 1_000;
    const metrics = new MetricsRegistry(() => clock);

    const stopFirst = metrics.startTimer("transfer_ms");
    clock += 40;
    expect(stopFirst()).toBe(40);
    const stopSecond = metrics.startTimer("transfer_ms");
    clock += 15;
    stopSecond();
    const stopThird = metrics.startTimer("transfer_ms");
    clock += 50;
    stopThird();

    expect(metrics.series("transfer_ms")).toEqual({ count: 3, min: 15, max: 50, avg: 35 });
    expect(metrics.series("hash_check_ms")).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });

  it("rounds the series average to two decimals", () => {
    const metrics = new MetricsRegistry();
    metrics.observe("throughput_bps", 1);
    metrics.observe("throughput_bps", 2);
    metrics.observe("throughput_bps", 2);

    expect(metrics.series("throughput_bps").avg).toBe(1.67);
  });

  it("keeps the last gauge value", () => {
    const metrics = new MetricsRegistry();
    metrics.setGauge("peak_concurrency", 3);
    metrics.setGauge("peak_concurrency", 8);

    expect(metrics.gauge("peak_concurrency")).toBe(8);
  });

  it("logs a snapshot naming every metric", () => {
    const lines: unknown[] = [];
    const logger = new Logger({ component: "cli", runId: "run_test", writer: (line) => lines.push(JSON.parse(line)) });
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("posts_fetched", 5);
    metrics.setGauge("peak_concurrency", 4);
    metrics.observe("throughput_bps", 1024);

    metrics.printSummary(logger);

    expect(lines).toEqual([
      expect.objectContaining({
        msg: "metrics_summary",
        counters: {
          posts_fetched: 5,
          api_pages_fetched: 0,
          downloads_done: 0,
          downloads_existed: 0,
          downloads_failed: 0,
          bytes_downloaded: 0,
        },
        gauges: { peak_concurrency: 4 },
        series: {
          api_page_ms: { count: 0, min: 0, max: 0, avg: 0 },
          hash_check_ms: { count: 0, min: 0, max: 0, avg: 0 },
          transfer_ms: { count: 0, min: 0, max: 0, avg: 0 },
          throughput_bps: { count: 1, min: 1024, max: 1024, avg: 1024 },
        },
      }),
    ]);
  });
});
