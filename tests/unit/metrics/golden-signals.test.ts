import { describe, it, expect } from 'vitest'
import { computeGoldenSignals } from '../../../src/metrics/golden-signals.js'
import { MetricNames } from '../../../src/metrics/names.js'
import { MetricsStore } from '../../../src/metrics/store.js'

describe('computeGoldenSignals', () => {
    it('reports a perfect success rate before any run', () => {
        const signals = computeGoldenSignals(new MetricsStore())
        expect(signals).toEqual({
            successRate: 100,
            p95LatencyMs: 0,
            costPerSuccessfulRun: 0,
            userConfirmedCorrectness: 0,
            policyViolationRate: 0,
        })
    })

    it('derives rates from the named counters', () => {
        const store = new MetricsStore()
        store.incrementCounter(MetricNames.workflowRuns, 3)
        store.incrementCounter(MetricNames.workflowSuccess, 2)
        store.incrementCounter(MetricNames.llmCostTotal, 0.5)
        store.incrementCounter(MetricNames.policyViolationsTotal, 1)
        store.incrementCounter(MetricNames.llmQualityCorrect, 3)
        store.incrementCounter(MetricNames.llmQualityIncorrect, 1)
        for (let i = 0; i < 100; i++) store.recordHistogram(MetricNames.workflowLatencyMs, i * 10)

        const signals = computeGoldenSignals(store)
        expect(signals.successRate).toBe(66.67)
        expect(signals.p95LatencyMs).toBe(950)
        expect(signals.costPerSuccessfulRun).toBe(0.25)
        expect(signals.userConfirmedCorrectness).toBe(75)
        expect(signals.policyViolationRate).toBe(33.33)
    })
})
