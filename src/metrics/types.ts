/** Write side of the metrics store, handed to components that only report. */
export interface MetricsSink {
    incrementCounter(name: string, value?: number): void
    setGauge(name: string, value: number): void
    recordHistogram(name: string, value: number): void
}

export const NOOP_METRICS: MetricsSink = {
    incrementCounter() {},
    setGauge() {},
    recordHistogram() {},
}

export interface MetricSample {
    value: number
    timestamp: number
}

export interface HistogramStats {
    count: number
    sum: number
    min: number
    max: number
    avg: number
    p50: number
    p95: number
    p99: number
}

export interface MetricsSnapshot {
    counters: Record<string, number>
    gauges: Record<string, number>
    histograms: Record<string, HistogramStats>
}
