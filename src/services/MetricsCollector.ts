/**
 * Prometheus metrics: a duration histogram labelled by operation and an
 * error counter labelled by type, registered on an injectable Registry.
 */

import { Counter, Histogram, Registry } from "prom-client";

export interface MetricsRecorder {
  recordDuration(operation: string, seconds: number): void;
  recordError?(errorType: string): void;
}

export const DURATION_METRIC = "confluence_rag_operation_duration_seconds";
export const ERROR_METRIC = "confluence_rag_errors_total";

const DEFAULT_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];

export interface PrometheusMetricsOptions {
  /** Defaults to a private registry, so instances never clash on metric names */
  registry?: Registry;
  buckets?: number[];
}

export interface DurationStats {
  count: number;
  totalSeconds: number;
}

export interface MetricsSnapshot {
  durations: Record<string, DurationStats>;
  errors: Record<string, number>;
}

export class PrometheusMetrics implements MetricsRecorder {
  readonly registry: Registry;
  private readonly durations: Histogram<string>;
  private readonly errors: Counter<string>;

  constructor(options: PrometheusMetricsOptions = {}) {
    this.registry = options.registry ?? new Registry();

    // A shared registry may already hold these from another instance
    const existingHistogram = this.registry.getSingleMetric(DURATION_METRIC);
    this.durations =
      existingHistogram instanceof Histogram
        ? existingHistogram
        : new Histogram({
            name: DURATION_METRIC,
            help: "Duration of Confluence RAG operations in seconds",
            labelNames: ["operation"],
            buckets: options.buckets ?? DEFAULT_BUCKETS,
            registers: [this.registry],
          });

    const existingCounter = this.registry.getSingleMetric(ERROR_METRIC);
    this.errors =
      existingCounter instanceof Counter
        ? existingCounter
        : new Counter({
            name: ERROR_METRIC,
            help: "Total number of Confluence RAG errors by type",
            labelNames: ["type"],
            registers: [this.registry],
          });
  }

  recordDuration(operation: string, seconds: number): void {
    this.durations.observe({ operation }, seconds);
  }

  recordError(errorType: string): void {
    this.errors.inc({ type: errorType });
  }

  /** Count and total per operation, error totals per type */
  async snapshot(): Promise<MetricsSnapshot> {
    const [durations, errors] = await Promise.all([this.durations.get(), this.errors.get()]);
    const snapshot: MetricsSnapshot = { durations: {}, errors: {} };

    for (const sample of durations.values) {
      const operation = sample.labels.operation;
      if (operation === undefined) continue;
      const key = String(operation);
      const stats = snapshot.durations[key] ?? { count: 0, totalSeconds: 0 };
      if (sample.metricName === `${DURATION_METRIC}_count`) stats.count = sample.value;
      else if (sample.metricName === `${DURATION_METRIC}_sum`) stats.totalSeconds = sample.value;
      snapshot.durations[key] = stats;
    }

    for (const sample of errors.values) {
      const type = sample.labels.type;
      if (type !== undefined) snapshot.errors[String(type)] = sample.value;
    }

    return snapshot;
  }

  /** Prometheus text exposition of the whole registry */
  exposition(): Promise<string> {
    return this.registry.metrics();
  }

  reset(): void {
    this.durations.reset();
    this.errors.reset();
  }
}
