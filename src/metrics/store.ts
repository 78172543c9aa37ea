import { RingBuffer } from '../core/ring-buffer.js'
import type { HistogramStats, MetricSample, MetricsSink, MetricsSnapshot } from './types.js'

const EMPTY_STATS: HistogramStats = { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 }

/** Nearest-rank on an ascending array: index floor(n * q), clamped to the last element. */
export function percentile(sorted: readonly number[], q: number): number {
    if (sorted.length === 0) return 0
    const idx = Math.min(Math.floor(sorted.length * q), sorted.length - 1)
    return sorted[idx] ?? 0
}

export function computeStats(values: readonly number[]): HistogramStats {
    if (values.length === 0) return { ...EMPTY_STATS }
    const sorted = [...values].sort((a, b) => a - b)
    const sum = sorted.reduce((acc, v) => acc + v, 0)
    return {
        count: sorted.length,
        sum,
        min: sorted[0] ?? 0,
        max: sorted[sorted.length - 1] ?? 0,
        avg: sum / sorted.length,
        p50: percentile(sorted, 0.5),
        p95: percentile(sorted, 0.95),
        p99: percentile(sorted, 0.99),
    }
}

/**
 * In-memory counters, gauges and bounded histograms. Histogram stats are
 * computed on read over the retained samples.
 */
export class MetricsStore implements MetricsSink {
    private counters = new Map<string, number>()
    private gauges = new Map<string, number>()
    private histograms = new Map<string, RingBuffer<MetricSample>>()

    constructor(private readonly maxSamples = 1000) {}

    incrementCounter(name: string, value = 1): void {
        this.counters.set(name, (this.counters.get(name) ?? 0) + value)
    }

    setGauge(name: string, value: number): void {
        this.gauges.set(name, value)
    }

    recordHistogram(name: string, value: number): void {
        let ring = this.histograms.get(name)
        if (!ring) {
            ring = new RingBuffer<MetricSample>(this.maxSamples)
            this.histograms.set(name, ring)
        }
        ring.push({ value, timestamp: Date.now() })
    }

    getCounter(name: string): number {
        return this.counters.get(name) ?? 0
    }

    getGauge(name: string): number {
        return this.gauges.get(name) ?? 0
    }

    getHistogramValues(name: string): MetricSample[] {
        return this.histograms.get(name)?.toArray() ?? []
    }

    getHistogramStats(name: string): HistogramStats {
        return computeStats(this.getHistogramValues(name).map((s) => s.value))
    }

    getAll(): MetricsSnapshot {
        const histograms: Record<string, HistogramStats> = {}
        for (const name of this.histograms.keys()) {
            histograms[name] = this.getHistogramStats(name)
        }
        return {
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            histograms,
        }
    }

    /** Overwrites counters and gauges with persisted values; histograms are not restored. */
    restore(snapshot: Pick<MetricsSnapshot, 'counters' | 'gauges'>): void {
        for (const [name, value] of Object.entries(snapshot.counters)) this.counters.set(name, value)
        for (const [name, value] of Object.entries(snapshot.gauges)) this.gauges.set(name, value)
    }

    reset(): void {
        this.counters.clear()
        this.gauges.clear()
        this.histograms.clear()
    }
}
