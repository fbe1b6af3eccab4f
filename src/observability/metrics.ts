import type { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, HistogramSummary>;
}

function summarize(values: number[]): HistogramSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count: values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    avg: Number((total / values.length).toFixed(2)),
  };
}

/** Per-process counters and duration samples; every name is known up front so snapshots always list all of them. */
export class MetricsRegistry {
  private readonly counters: Record<MetricCounterName, number> = {
    pages_fetched: 0,
    candidates_discovered: 0,
    candidates_skipped: 0,
    fetch_ok: 0,
    fetch_failed: 0,
    fetch_retries: 0,
  };

  private readonly samples: Record<MetricTimerName, number[]> = {
    page_fetch_ms: [],
    download_ms: [],
    render_ms: [],
  };

  constructor(private readonly clock: () => number = Date.now) {}

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  getCounter(name: MetricCounterName): number {
    return this.counters[name];
  }

  /** Starts a sample; the returned function records and returns the elapsed ms. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.clock();
    return () => {
      const durationMs = this.clock() - startedAt;
      this.samples[name].push(durationMs);
      return durationMs;
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: { ...this.counters },
      timers: {
        page_fetch_ms: summarize(this.samples.page_fetch_ms),
        download_ms: summarize(this.samples.download_ms),
        render_ms: summarize(this.samples.render_ms),
      },
    };
  }

  /** Emits the snapshot as one `metrics_summary` log event. */
  report(logger: Logger): void {
    const { counters, timers } = this.snapshot();
    logger.info("metrics_summary", { counters, timers });
  }
}
