import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { MetricNames } from '../metrics/names.js'
import { NOOP_METRICS, type MetricsSink } from '../metrics/types.js'
import { withRetry, type RetryOptions } from '../resilience/retry.js'
import type { DecisionSink } from './sinks.js'
import type { PolicyDecision } from './types.js'

export interface DecisionLoggerOptions {
    batchSize?: number
    flushIntervalMs?: number
    metrics?: MetricsSink
    /** Retries a single sink write; the batch is kept if every attempt fails. */
    retry?: RetryOptions
}

/**
 * Batches policy decisions and writes them to a sink on a size or time
 * trigger. Entries are cleared only after a successful write, so delivery is
 * at least once.
 */
export class DecisionLogger {
    private batch: PolicyDecision[] = []
    private flushChain: Promise<boolean> = Promise.resolve(true)
    private loop: Promise<void> | null = null
    private abort: AbortController | null = null
    private lastFlushOk = true

    readonly batchSize: number
    private readonly flushIntervalMs: number
    private readonly metrics: MetricsSink

    constructor(
        private readonly sink: DecisionSink,
        private readonly logger: Logger,
        private readonly options: DecisionLoggerOptions = {}
    ) {
        this.batchSize = options.batchSize ?? 100
        this.flushIntervalMs = options.flushIntervalMs ?? 5000
        this.metrics = options.metrics ?? NOOP_METRICS
    }

    get pending(): number {
        return this.batch.length
    }

    get lastFlushSucceeded(): boolean {
        return this.lastFlushOk
    }

    get running(): boolean {
        return this.loop !== null
    }

    /** Appends to the batch without waiting; a full batch schedules a background flush. */
    record(decision: PolicyDecision): void {
        this.batch.push(decision)
        this.metrics.setGauge(MetricNames.decisionLogPending, this.batch.length)
        if (this.batch.length >= this.batchSize) {
            void this.flush()
        }
    }

    /** Writes the current batch. Resolves false on failure and never rejects. */
    flush(): Promise<boolean> {
        this.flushChain = this.flushChain.then(() => this.flushOnce())
        return this.flushChain
    }

    private async flushOnce(): Promise<boolean> {
        if (this.batch.length === 0) return true
        const entries = this.batch
        this.batch = []
        const started = Date.now()

        try {
            if (this.options.retry) {
                await withRetry(() => this.sink.write(entries), this.options.retry)
            } else {
                await this.sink.write(entries)
            }
            this.lastFlushOk = true
            this.metrics.recordHistogram(MetricNames.decisionLogFlushLatencyMs, Date.now() - started)
            this.logger.debug({ count: entries.length, sink: this.sink.name }, 'decision:flushed')
            return true
        } catch (error) {
            this.batch = [...entries, ...this.batch]
            this.lastFlushOk = false
            this.metrics.incrementCounter(MetricNames.decisionLogFlushFailures)
            this.logger.error(
                { count: entries.length, sink: this.sink.name, error: errorMessage(error) },
                'decision:flush-failed'
            )
            return false
        } finally {
            this.metrics.setGauge(MetricNames.decisionLogPending, this.batch.length)
        }
    }

    /** Starts the periodic flush loop. */
    start(): void {
        if (this.loop) return
        const controller = new AbortController()
        this.abort = controller
        this.loop = this.runLoop(controller.signal)
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            await waitOrAbort(this.flushIntervalMs, signal)
            if (signal.aborted) break
            await this.flush()
        }
    }

    /** Cancels the loop and performs one final flush. */
    async stop(): Promise<boolean> {
        this.abort?.abort()
        if (this.loop) await this.loop
        this.loop = null
        this.abort = null
        return this.flush()
    }
}

function waitOrAbort(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        const timer = setTimeout(done, ms)
        function done() {
            clearTimeout(timer)
            signal.removeEventListener('abort', done)
            resolve()
        }
        signal.addEventListener('abort', done, { once: true })
    })
}
