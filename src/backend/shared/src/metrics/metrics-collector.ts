/**
 * Metrics Collection Module
 *
 * In-process counters, gauges and latency histograms for analysis runs.
 * Series are keyed by metric name plus sorted tags, so `{ stage: 'scoring' }`
 * and `{ stage: 'rank_robustness' }` accumulate separately.
 *
 * @tested tests/property/analysis-logging.property.test.ts
 */

/**
 * Metric types supported by the collector
 */
export const MetricType = {
  COUNTER: 'counter',
  GAUGE: 'gauge',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export type MetricTags = Record<string, string>;

/**
 * Cumulative histogram state; `counts` has one extra overflow bucket
 */
export interface HistogramBuckets {
  boundaries: readonly number[];
  counts: number[];
  sum: number;
  count: number;
}

type MetricSeries =
  | { type: typeof MetricType.COUNTER; value: number }
  | { type: typeof MetricType.GAUGE; value: number }
  | { type: typeof MetricType.HISTOGRAM; buckets: HistogramBuckets };

export interface TimerResult {
  durationMs: number;
  startTime: Date;
  endTime: Date;
}

export interface MetricsCollectorConfig {
  /** Upper bounds of the latency buckets, in milliseconds */
  latencyBuckets: readonly number[];
  /** Tags merged into every series key */
  defaultTags: MetricTags;
}

/**
 * Default histogram buckets for latency metrics (in milliseconds)
 */
export const DEFAULT_LATENCY_BUCKETS: readonly number[] = [1, 5, 10, 50, 100, 500, 1000, 5000, 10000, 60000];

export const defaultMetricsConfig: MetricsCollectorConfig = {
  latencyBuckets: DEFAULT_LATENCY_BUCKETS,
  defaultTags: {},
};

/**
 * Analysis stages that report latency and trial counts
 */
export const AnalysisStage = {
  SCORING: 'scoring',
  SCORE_INTERVALS: 'score_intervals',
  RANK_ROBUSTNESS: 'rank_robustness',
} as const;

export type AnalysisStage = (typeof AnalysisStage)[keyof typeof AnalysisStage];

export const MetricNames = {
  ANALYSIS_RUN_COUNT: 'analysis_run_count',
  ANALYSIS_ERROR_COUNT: 'analysis_error_count',
  ANALYSIS_LATENCY: 'analysis_latency_ms',
  STAGE_LATENCY: 'stage_latency_ms',
  TRIALS_EXECUTED: 'trials_executed',
  INTERVENTION_COUNT: 'intervention_count',
} as const;

function seriesKey(name: string, tags: MetricTags): string {
  const parts = Object.keys(tags)
    .sort()
    .map((tag) => `${tag}=${tags[tag]}`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

function bucketIndex(boundaries: readonly number[], value: number): number {
  const index = boundaries.findIndex((boundary) => value <= boundary);
  return index === -1 ? boundaries.length : index;
}

export class MetricsCollector {
  private readonly config: MetricsCollectorConfig;
  private readonly series = new Map<string, MetricSeries>();

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  private key(name: string, tags: MetricTags): string {
    return seriesKey(name, { ...this.config.defaultTags, ...tags });
  }

  incrementCounter(name: string, value = 1, tags: MetricTags = {}): void {
    const key = this.key(name, tags);
    const current = this.series.get(key);
    const previous = current?.type === MetricType.COUNTER ? current.value : 0;
    this.series.set(key, { type: MetricType.COUNTER, value: previous + value });
  }

  getCounter(name: string, tags: MetricTags = {}): number {
    const current = this.series.get(this.key(name, tags));
    return current?.type === MetricType.COUNTER ? current.value : 0;
  }

  setGauge(name: string, value: number, tags: MetricTags = {}): void {
    this.series.set(this.key(name, tags), { type: MetricType.GAUGE, value });
  }

  getGauge(name: string, tags: MetricTags = {}): number {
    const current = this.series.get(this.key(name, tags));
    return current?.type === MetricType.GAUGE ? current.value : 0;
  }

  recordHistogram(name: string, value: number, tags: MetricTags = {}): void {
    const key = this.key(name, tags);
    const current = this.series.get(key);

    let buckets: HistogramBuckets;
    if (current?.type === MetricType.HISTOGRAM) {
      buckets = current.buckets;
    } else {
      const boundaries = this.config.latencyBuckets;
      buckets = { boundaries, counts: new Array<number>(boundaries.length + 1).fill(0), sum: 0, count: 0 };
      this.series.set(key, { type: MetricType.HISTOGRAM, buckets });
    }

    buckets.counts[bucketIndex(buckets.boundaries, value)] += 1;
    buckets.sum += value;
    buckets.count += 1;
  }

  getHistogram(name: string, tags: MetricTags = {}): HistogramBuckets | undefined {
    const current = this.series.get(this.key(name, tags));
    return current?.type === MetricType.HISTOGRAM ? current.buckets : undefined;
  }

  getAverageLatency(name: string, tags: MetricTags = {}): number {
    const histogram = this.getHistogram(name, tags);
    return histogram && histogram.count > 0 ? histogram.sum / histogram.count : 0;
  }

  /**
   * Starts a timer; call the returned function to read the elapsed time
   */
  startTimer(): () => TimerResult {
    const startTime = new Date();
    const start = performance.now();

    return () => ({
      durationMs: performance.now() - start,
      startTime,
      endTime: new Date(),
    });
  }

  recordStage(stage: AnalysisStage, durationMs: number, trials = 0): void {
    this.recordHistogram(MetricNames.STAGE_LATENCY, durationMs, { stage });
    if (trials > 0) {
      this.incrementCounter(MetricNames.TRIALS_EXECUTED, trials, { stage });
    }
  }

  recordAnalysisRun(durationMs: number, interventionCount: number): void {
    this.recordHistogram(MetricNames.ANALYSIS_LATENCY, durationMs);
    this.incrementCounter(MetricNames.ANALYSIS_RUN_COUNT);
    this.setGauge(MetricNames.INTERVENTION_COUNT, interventionCount);
  }

  /**
   * Counts a run rejected before any trial, tagged by error code
   */
  recordAnalysisError(code: string): void {
    this.incrementCounter(MetricNames.ANALYSIS_ERROR_COUNT, 1, { code });
  }
}

export function createMetricsCollector(config: Partial<MetricsCollectorConfig> = {}): MetricsCollector {
  return new MetricsCollector(config);
}
