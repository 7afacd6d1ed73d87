/**
 * Loan Reconciliation MCP Server - Metrics collection
 */

/**
 * Histogram statistics.
 */
export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  sum: number;
  p50: number;
  p95: number;
}

/**
 * Running timer.
 */
export interface Timer {
  stop: () => number;
}

/**
 * In-process counters, gauges and duration histograms.
 */
export class Metrics {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private startTime: number = Date.now();
  private maxHistogramSize: number = 1000;

  increment(name: string, value: number = 1): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  /**
   * Record a histogram value. Only the newest values are kept.
   */
  histogram(name: string, value: number): void {
    let values = this.histograms.get(name);

    if (!values) {
      values = [];
      this.histograms.set(name, values);
    }

    values.push(value);

    if (values.length > this.maxHistogramSize) {
      values.shift();
    }
  }

  /**
   * Start a timer for a named duration histogram.
   */
  startTimer(name: string): Timer {
    const start = Date.now();
    let stopped = false;

    return {
      stop: (): number => {
        if (stopped) return 0;
        stopped = true;
        const duration = Date.now() - start;
        this.histogram(name, duration);
        return duration;
      }
    };
  }

  private calculateHistogramStats(values: number[]): HistogramStats {
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, sum: 0, p50: 0, p95: 0 };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((a, b) => a + b, 0);

    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: values.length,
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
      avg: Math.round((sum / values.length) * 100) / 100,
      sum,
      p50: percentile(50),
      p95: percentile(95)
    };
  }

  getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  getGauge(name: string): number {
    return this.gauges.get(name) || 0;
  }

  getHistogram(name: string): HistogramStats | null {
    const values = this.histograms.get(name);
    return values ? this.calculateHistogramStats(values) : null;
  }

  /**
   * Return all metrics as a structured payload.
   */
  getAll(): Record<string, unknown> {
    const histogramStats: Record<string, HistogramStats> = {};

    for (const [name, values] of this.histograms) {
      histogramStats[name] = this.calculateHistogramStats(values);
    }

    return {
      uptime_ms: Date.now() - this.startTime,
      collected_at: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms: histogramStats
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.startTime = Date.now();
  }
}

// Singleton instance.
export const metrics = new Metrics();

// Predefined metric name constants.
export const MetricNames = {
  // Counters
  TOOL_CALLS_TOTAL: 'tool_calls_total',
  TOOL_CALLS_SUCCESS: 'tool_calls_success',
  TOOL_CALLS_FAILED: 'tool_calls_failed',
  QUERIES_TOTAL: 'queries_total',
  QUERIES_FAILED: 'queries_failed',
  PROTOCOL_ERRORS: 'protocol_errors',
  SNAPSHOT_BUILDS: 'snapshot_builds',
  ROWS_SKIPPED: 'rows_skipped',

  // Gauges
  RECORDS_LOADED: 'records_loaded',
  MISMATCHES_LOADED: 'mismatches_loaded',

  // Histograms (durations)
  TOOL_DURATION_MS: 'tool_duration_ms',
  QUERY_DURATION_MS: 'query_duration_ms',
  BUILD_DURATION_MS: 'build_duration_ms',
  LOAD_DURATION_MS: 'load_duration_ms',
} as const;
