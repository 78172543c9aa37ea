import { MetricNames } from './names.js'
import { percentile, type MetricsStore } from './store.js'

export interface GoldenSignals {
    /** Percent of workflow runs that succeeded; 100 when nothing ran yet. */
    successRate: number
    p95LatencyMs: number
    costPerSuccessfulRun: number
    /** Percent of user feedback marked correct; 0 without feedback. */
    userConfirmedCorrectness: number
    /** Policy violations per workflow run, as a percent. */
    policyViolationRate: number
}

export interface GoldenSignalSources {
    runs: string
    success: string
    latency: string
    cost: string
    correct: string
    incorrect: string
    violations: string
}

export const DEFAULT_SIGNAL_SOURCES: GoldenSignalSources = {
    runs: MetricNames.workflowRuns,
    success: MetricNames.workflowSuccess,
    latency: MetricNames.workflowLatencyMs,
    cost: MetricNames.llmCostTotal,
    correct: MetricNames.llmQualityCorrect,
    incorrect: MetricNames.llmQualityIncorrect,
    violations: MetricNames.policyViolationsTotal,
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits
    return Math.round(value * factor) / factor
}

export function computeGoldenSignals(
    store: MetricsStore,
    sources: GoldenSignalSources = DEFAULT_SIGNAL_SOURCES
): GoldenSignals {
    const runs = store.getCounter(sources.runs)
    const successes = store.getCounter(sources.success)
    const latencies = store
        .getHistogramValues(sources.latency)
        .map((s) => s.value)
        .sort((a, b) => a - b)
    const cost = store.getCounter(sources.cost)
    const correct = store.getCounter(sources.correct)
    const incorrect = store.getCounter(sources.incorrect)
    const feedback = correct + incorrect
    const violations = store.getCounter(sources.violations)

    return {
        successRate: round(runs > 0 ? (successes / runs) * 100 : 100, 2),
        p95LatencyMs: round(percentile(latencies, 0.95), 2),
        costPerSuccessfulRun: round(successes > 0 ? cost / successes : 0, 4),
        userConfirmedCorrectness: round(feedback > 0 ? (correct / feedback) * 100 : 0, 2),
        policyViolationRate: round(runs > 0 ? (violations / runs) * 100 : 0, 2),
    }
}
