import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { MetricNames } from '../metrics/names.js'
import type { MetricsSink } from '../metrics/types.js'

export interface HealthCheckResult {
    name: string
    passed: boolean
    message: string
    detail: Record<string, unknown>
}

export type HealthCheckOutcome = Omit<HealthCheckResult, 'name'>

export type HealthCheck = () => HealthCheckOutcome | Promise<HealthCheckOutcome>

/** `degraded` is part of the payload contract but nothing produces it yet. */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy'

export interface HealthReport {
    status: HealthStatus
    results: HealthCheckResult[]
    timestamp: string
}

export class HealthChecker {
    private checks = new Map<string, HealthCheck>()

    constructor(private readonly logger: Logger) {}

    register(name: string, check: HealthCheck): void {
        this.checks.set(name, check)
    }

    unregister(name: string): boolean {
        return this.checks.delete(name)
    }

    get names(): string[] {
        return [...this.checks.keys()]
    }

    /** Runs every check; a check that throws counts as failed. */
    async checkHealth(): Promise<HealthReport> {
        const results = await Promise.all(
            [...this.checks].map(async ([name, check]): Promise<HealthCheckResult> => {
                try {
                    const outcome = await check()
                    return { name, ...outcome }
                } catch (error) {
                    this.logger.warn({ check: name, error: errorMessage(error) }, 'health:check-error')
                    return { name, passed: false, message: errorMessage(error), detail: { error: true } }
                }
            })
        )
        return {
            status: results.every((r) => r.passed) ? 'healthy' : 'unhealthy',
            results,
            timestamp: new Date().toISOString(),
        }
    }
}

export interface HealthPayload {
    status: HealthStatus
    checks: Record<string, { status: 'pass' | 'fail'; message: string; detail: Record<string, unknown> }>
    timestamp: string
}

export function healthPayload(report: HealthReport): HealthPayload {
    const checks: HealthPayload['checks'] = {}
    for (const result of report.results) {
        checks[result.name] = {
            status: result.passed ? 'pass' : 'fail',
            message: result.message,
            detail: result.detail,
        }
    }
    return { status: report.status, checks, timestamp: report.timestamp }
}

const STATUS_VALUE: Record<HealthStatus, number> = { healthy: 1, degraded: 0.5, unhealthy: 0 }

export function recordHealthMetrics(report: HealthReport, metrics: MetricsSink): void {
    metrics.setGauge(MetricNames.healthStatus, STATUS_VALUE[report.status])
    for (const result of report.results) {
        metrics.setGauge(MetricNames.healthCheck(result.name), result.passed ? 1 : 0)
    }
}
