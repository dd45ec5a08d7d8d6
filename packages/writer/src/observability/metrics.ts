/**
 * In-process metrics for the write path
 * Tracks labelled counters and latency histograms
 */

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

export type Labels = Record<string, string>;

// Keep only the most recent samples to bound memory
const MAX_HISTOGRAM_SAMPLES = 1000;

export class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}, delta = 1): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) ?? { count: 0 };
    counter.count += delta;
    this.#counters.set(key, counter);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    if (histogram.values.length > MAX_HISTOGRAM_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels))?.count ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    const histogram = this.#histograms.get(this.makeKey(name, labels));
    return histogram ? this.summarize(histogram) : null;
  }

  /**
   * Snapshot of every counter and histogram, keyed by name and labels
   */
  snapshot(): { counters: Record<string, number>; histograms: Record<string, HistogramSummary> } {
    const counters: Record<string, number> = {};
    for (const [key, counter] of this.#counters) {
      counters[key] = counter.count;
    }

    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, histogram] of this.#histograms) {
      const summary = this.summarize(histogram);
      if (summary) {
        histograms[key] = summary;
      }
    }

    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private summarize(histogram: Histogram): HistogramSummary | null {
    if (histogram.values.length === 0) {
      return null;
    }
    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: histogram.count,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

/**
 * Attempt/insert/error counters and latency for one kind of store write
 */
export class WriteMetrics {
  readonly #registry: MetricsRegistry;
  readonly #namespace: string;

  constructor(registry: MetricsRegistry, namespace: string) {
    this.#registry = registry;
    this.#namespace = namespace;
  }

  /**
   * Record the outcome of one write
   * @param err - Error raised by the write, if any
   * @param latencyMs - Time spent in the write
   */
  emit(err: unknown, latencyMs: number): void {
    const ns = this.#namespace;
    this.#registry.inc(`spanstore.${ns}.attempts`);
    if (err) {
      this.#registry.inc(`spanstore.${ns}.errors`);
    } else {
      this.#registry.inc(`spanstore.${ns}.inserts`);
    }
    this.#registry.observe(`spanstore.${ns}.latency_ms`, latencyMs, {
      result: err ? "err" : "ok",
    });
  }

  /**
   * Run a write and record its outcome
   */
  async track<T>(fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    let failure: unknown;
    try {
      return await fn();
    } catch (err) {
      failure = err ?? new Error("write failed");
      throw err;
    } finally {
      this.emit(failure, Date.now() - start);
    }
  }
}

/**
 * Global metrics registry
 */
export const metrics = new MetricsRegistry();
