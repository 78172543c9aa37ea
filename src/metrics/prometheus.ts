import type { MetricsSnapshot } from './types.js'

type MetricType = 'counter' | 'gauge' | 'histogram'

/** Always exposed, at zero if never written, so dashboards can discover them. */
export const KEY_METRICS: ReadonlyArray<{ name: string; type: MetricType }> = [
    { name: 'llm_cost_total', type: 'counter' },
    { name: 'policy_violations_total', type: 'counter' },
    { name: 'workflow_runs', type: 'counter' },
    { name: 'workflow_success', type: 'counter' },
    { name: 'workflow_errors', type: 'counter' },
]

export function sanitizeMetricName(name: string): string {
    return name.replace(/[.-]/g, '_').toLowerCase()
}

export function formatValue(value: number): string {
    if (Number.isNaN(value)) return 'NaN'
    if (!Number.isFinite(value)) return value > 0 ? '+Inf' : '-Inf'
    return value.toString()
}

/** Prometheus text exposition of a metrics snapshot. */
export function renderPrometheus(snapshot: MetricsSnapshot): string {
    const lines: string[] = []
    const declared = new Set<string>()

    const declare = (name: string, type: MetricType) => {
        if (declared.has(name)) return
        declared.add(name)
        lines.push(`# TYPE ${name} ${type}`)
    }

    for (const [raw, value] of Object.entries(snapshot.counters)) {
        const name = sanitizeMetricName(raw)
        declare(name, 'counter')
        lines.push(`${name} ${formatValue(value)}`)
    }

    for (const [raw, value] of Object.entries(snapshot.gauges)) {
        const name = sanitizeMetricName(raw)
        declare(name, 'gauge')
        lines.push(`${name} ${formatValue(value)}`)
    }

    for (const [raw, stats] of Object.entries(snapshot.histograms)) {
        const name = sanitizeMetricName(raw)
        declare(name, 'histogram')
        lines.push(`${name}_count ${stats.count}`)
        lines.push(`${name}_sum ${formatValue(stats.sum)}`)
        lines.push(`${name}_bucket{le="+Inf"} ${stats.count}`)
        const p95 = `${name}_p95`
        declare(p95, 'gauge')
        lines.push(`${p95} ${formatValue(stats.p95)}`)
    }

    for (const { name, type } of KEY_METRICS) {
        if (declared.has(name)) continue
        declare(name, type)
        lines.push(`${name} 0`)
    }

    return `${lines.join('\n')}\n`
}
