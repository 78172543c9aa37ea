import type { MetricsStore } from '../metrics/store.js'
import type { DecisionLogger } from '../policy/decision-logger.js'
import type { TraceExporter } from '../tracing/exporter.js'
import type { HealthCheck } from './checker.js'

export function traceExporterCheck(exporter: TraceExporter): HealthCheck {
    return () => {
        if (!exporter.enabled) return { passed: true, message: 'disabled', detail: {} }
        const stats = exporter.stats()
        return {
            passed: stats.healthy,
            message: stats.healthy ? 'ok' : 'trace backend unhealthy',
            detail: { ...stats, initialized: exporter.initialized },
        }
    }
}

export function decisionLogCheck(logger: DecisionLogger): HealthCheck {
    return () => {
        const limit = logger.batchSize * 10
        const backlog = logger.pending > limit
        const passed = !backlog && logger.lastFlushSucceeded
        let message = 'ok'
        if (backlog) message = `pending decisions exceed ${limit}`
        else if (!logger.lastFlushSucceeded) message = 'last flush failed'
        return {
            passed,
            message,
            detail: { pending: logger.pending, running: logger.running, lastFlushSucceeded: logger.lastFlushSucceeded },
        }
    }
}

export function metricsStoreCheck(store: MetricsStore): HealthCheck {
    return () => {
        const snapshot = store.getAll()
        return {
            passed: true,
            message: 'ok',
            detail: {
                counters: Object.keys(snapshot.counters).length,
                gauges: Object.keys(snapshot.gauges).length,
                histograms: Object.keys(snapshot.histograms).length,
            },
        }
    }
}
