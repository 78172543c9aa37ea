import { describe, it, expect } from 'vitest'
import { formatValue, renderPrometheus, sanitizeMetricName } from '../../../src/metrics/prometheus.js'
import { MetricsStore } from '../../../src/metrics/store.js'

describe('sanitizeMetricName', () => {
    it('replaces dots and dashes and lowercases', () => {
        expect(sanitizeMetricName('llm.cost.model.GPT-4o')).toBe('llm_cost_model_gpt_4o')
    })
})

describe('formatValue', () => {
    it('formats infinities', () => {
        expect(formatValue(Infinity)).toBe('+Inf')
        expect(formatValue(-Infinity)).toBe('-Inf')
        expect(formatValue(1.5)).toBe('1.5')
    })
})

describe('renderPrometheus', () => {
    it('emits only the key metrics for an empty store', () => {
        const text = renderPrometheus(new MetricsStore().getAll())
        expect(text).toBe(
            [
                '# TYPE llm_cost_total counter',
                'llm_cost_total 0',
                '# TYPE policy_violations_total counter',
                'policy_violations_total 0',
                '# TYPE workflow_runs counter',
                'workflow_runs 0',
                '# TYPE workflow_success counter',
                'workflow_success 0',
                '# TYPE workflow_errors counter',
                'workflow_errors 0',
                '',
            ].join('\n')
        )
    })

    it('renders counters, gauges and histograms', () => {
        const store = new MetricsStore()
        store.incrementCounter('workflow.runs', 2)
        store.setGauge('observability.trace_export_queue_size', 4)
        store.recordHistogram('workflow.latency_ms', 10)
        store.recordHistogram('workflow.latency_ms', 30)

        const lines = renderPrometheus(store.getAll()).trimEnd().split('\n')
        expect(lines.slice(0, 12)).toEqual([
            '# TYPE workflow_runs counter',
            'workflow_runs 2',
            '# TYPE observability_trace_export_queue_size gauge',
            'observability_trace_export_queue_size 4',
            '# TYPE workflow_latency_ms histogram',
            'workflow_latency_ms_count 2',
            'workflow_latency_ms_sum 40',
            'workflow_latency_ms_bucket{le="+Inf"} 2',
            '# TYPE workflow_latency_ms_p95 gauge',
            'workflow_latency_ms_p95 30',
            '# TYPE llm_cost_total counter',
            'llm_cost_total 0',
        ])
        expect(lines.filter((l) => l === '# TYPE workflow_runs counter')).toHaveLength(1)
        expect(lines).not.toContain('workflow_runs 0')
    })
})
