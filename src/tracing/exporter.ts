import type { SpanContext, Tracer as BackendTracer } from '@opentelemetry/api'
import { ExportResultCode, type ExportResult } from '@opentelemetry/core'
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http'
import { resourceFromAttributes } from '@opentelemetry/resources'
import {
    BasicTracerProvider,
    BatchSpanProcessor,
    SimpleSpanProcessor,
    type ReadableSpan,
    type SpanExporter,
} from '@opentelemetry/sdk-trace-base'
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions'
import { settleWithin, sleep } from '../core/async.js'
import { BoundedQueue } from '../core/bounded-queue.js'
import { errorMessage, toError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, failure, ok, type Failure, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { MetricNames } from '../metrics/names.js'
import { NOOP_METRICS, type MetricsSink } from '../metrics/types.js'
import { DEFAULT_RETRY_OPTIONS, retryResult, type RetryOptions } from '../resilience/retry.js'
import { BackendSpanHandle, HandleIndex } from './handle.js'
import type { Span } from './types.js'

export interface TraceExporterOptions {
    serviceName: string
    serviceVersion?: string
    endpoint: string
    enabled: boolean
    /** Name of the workflow root span, the only fallback parent for orphaned children. */
    rootSpanName: string
    queueCapacity?: number
    unhealthyQueueDepth?: number
    healthCheckIntervalMs?: number
    pollIntervalMs?: number
    shutdownGraceMs?: number
    processor?: 'batch' | 'simple'
    /** Replaces the OTLP network exporter, e.g. with an in-memory one in tests. */
    spanExporter?: SpanExporter
    metrics?: MetricsSink
    retry?: RetryOptions
}

export interface TraceExporterStats {
    queued: number
    liveHandles: number
    rendered: number
    dropped: number
    skipped: number
    failures: number
    healthy: boolean
}

interface ObservedExporterHooks {
    metrics: MetricsSink
    logger: Logger
    retry: RetryOptions
    onFailure(error: Failure): void
}

/** Wraps the network exporter with retry, delivery metrics and health reporting. */
export class ObservedSpanExporter implements SpanExporter {
    constructor(
        private readonly inner: SpanExporter,
        private readonly hooks: ObservedExporterHooks
    ) {}

    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        void this.deliver(spans).then(resultCallback, (error: unknown) =>
            resultCallback({ code: ExportResultCode.FAILED, error: toError(error) })
        )
    }

    private async deliver(spans: ReadableSpan[]): Promise<ExportResult> {
        const { metrics, logger } = this.hooks
        const started = Date.now()
        const result = await retryResult(() => this.exportOnce(spans), this.hooks.retry)
        metrics.recordHistogram(MetricNames.traceExportLatencyMs, Date.now() - started)

        if (result.ok) {
            metrics.incrementCounter(MetricNames.traceExportDelivered, spans.length)
            return { code: ExportResultCode.SUCCESS }
        }
        metrics.incrementCounter(MetricNames.traceExportFailures, spans.length)
        logger.warn({ spans: spans.length, error: result.error.message }, 'trace:export-failed')
        this.hooks.onFailure(result.error)
        return { code: ExportResultCode.FAILED, error: new Error(result.error.message) }
    }

    private exportOnce(spans: ReadableSpan[]): Promise<Result<void, Failure>> {
        return new Promise((resolve) => {
            try {
                this.inner.export(spans, (result) => {
                    if (result.code === ExportResultCode.SUCCESS) {
                        resolve(ok(undefined))
                    } else {
                        const message = result.error ? errorMessage(result.error) : 'export failed'
                        resolve(err(failure('retryable', message, result.error)))
                    }
                })
            } catch (error) {
                resolve(err(failure('retryable', errorMessage(error), error)))
            }
        })
    }

    forceFlush(): Promise<void> {
        return this.inner.forceFlush?.() ?? Promise.resolve()
    }

    shutdown(): Promise<void> {
        return this.inner.shutdown()
    }
}

/** Insertion-ordered map that forgets its oldest entries past `capacity`. */
class BoundedMap<K, V> {
    private map = new Map<K, V>()

    constructor(private readonly capacity: number) {}

    set(key: K, value: V): void {
        this.map.delete(key)
        this.map.set(key, value)
        while (this.map.size > this.capacity) {
            const oldest = this.map.keys().next()
            if (oldest.done) break
            this.map.delete(oldest.value)
        }
    }

    get(key: K): V | undefined {
        return this.map.get(key)
    }

    clear(): void {
        this.map.clear()
    }
}

/**
 * Bridges the span registry to an OpenTelemetry backend. Backend spans are
 * opened eagerly when a local span starts and closed synchronously when it
 * ends. Spans that ended without a live handle go through a bounded queue to
 * a single background worker. Producers never wait on the network: a full
 * queue drops the span.
 */
export class TraceExporter {
    private provider: BasicTracerProvider | null = null
    private tracer: BackendTracer | null = null
    private readonly queue: BoundedQueue<Span>
    private readonly handles = new HandleIndex()
    private readonly closedContexts: BoundedMap<string, SpanContext>
    private readonly closedRoots: BoundedMap<string, SpanContext>
    private readonly metrics: MetricsSink
    private cleanups: Array<() => void> = []
    private worker: Promise<void> | null = null
    private shutdownPromise: Promise<void> | null = null
    private stopping = false
    private processing = false
    private healthy = true
    private lastHealthCheck = 0
    private counts = { rendered: 0, dropped: 0, skipped: 0, failures: 0 }

    readonly unhealthyQueueDepth: number
    private readonly healthCheckIntervalMs: number
    private readonly pollIntervalMs: number
    private readonly shutdownGraceMs: number

    constructor(
        private readonly logger: Logger,
        private readonly options: TraceExporterOptions
    ) {
        const capacity = options.queueCapacity ?? 1000
        this.queue = new BoundedQueue<Span>(capacity)
        this.closedContexts = new BoundedMap(capacity)
        this.closedRoots = new BoundedMap(capacity)
        this.metrics = options.metrics ?? NOOP_METRICS
        this.unhealthyQueueDepth = options.unhealthyQueueDepth ?? Math.max(1, Math.floor(capacity / 2))
        this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 30_000
        this.pollIntervalMs = options.pollIntervalMs ?? 1000
        this.shutdownGraceMs = options.shutdownGraceMs ?? 5000
    }

    get enabled(): boolean {
        return this.options.enabled
    }

    get initialized(): boolean {
        return this.tracer !== null
    }

    /** Builds the backend provider. Spans started before this are rendered later by the worker. */
    initialize(): void {
        if (!this.options.enabled || this.tracer || this.stopping) return

        const inner = this.options.spanExporter ?? new OTLPTraceExporter({ url: this.options.endpoint })
        const observed = new ObservedSpanExporter(inner, {
            metrics: this.metrics,
            logger: this.logger,
            retry: this.options.retry ?? DEFAULT_RETRY_OPTIONS,
            onFailure: () => this.markUnhealthy('export failed'),
        })
        const processor =
            this.options.processor === 'simple' ? new SimpleSpanProcessor(observed) : new BatchSpanProcessor(observed)

        this.provider = new BasicTracerProvider({
            resource: resourceFromAttributes({
                [ATTR_SERVICE_NAME]: this.options.serviceName,
                [ATTR_SERVICE_VERSION]: this.options.serviceVersion ?? '0.0.0',
            }),
            spanProcessors: [processor],
        })
        this.tracer = this.provider.getTracer(this.options.serviceName)
        this.metrics.setGauge(MetricNames.collectorHealth, 1)
        this.logger.info({ endpoint: this.options.spanExporter ? 'custom' : this.options.endpoint }, 'trace:initialized')
    }

    /** Subscribes to span start/end on the bus. */
    attach(eventBus: TypedEventEmitter): void {
        const onStart = ({ span }: { span: Span }) => this.onSpanStart(span)
        const onEnd = ({ span }: { span: Span }) => this.onSpanEnd(span)
        eventBus.on('span:start', onStart)
        eventBus.on('span:end', onEnd)
        this.cleanups.push(() => eventBus.off('span:start', onStart))
        this.cleanups.push(() => eventBus.off('span:end', onEnd))
    }

    detach(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    /** Initializes if needed and starts the background worker. */
    start(): void {
        if (!this.options.enabled || this.worker || this.stopping) return
        this.initialize()
        this.worker = this.runWorker()
    }

    onSpanStart(span: Span): void {
        if (!this.tracer || this.stopping) return
        try {
            const handle = BackendSpanHandle.open(this.tracer, span, this.resolveParent(span))
            this.handles.add(handle)
        } catch (error) {
            this.logger.warn({ spanId: span.id, error: errorMessage(error) }, 'trace:open-failed')
        }
    }

    onSpanEnd(span: Span): void {
        if (!this.options.enabled) return
        if (span.endTime === undefined) return

        const handle = this.handles.get(span.id)
        if (handle && this.provider) {
            try {
                handle.close(span)
                this.remember(handle)
                this.counts.rendered++
            } catch (error) {
                this.counts.failures++
                this.metrics.incrementCounter(MetricNames.traceExportFailures)
                this.logger.warn({ spanId: span.id, error: errorMessage(error) }, 'trace:close-failed')
            } finally {
                this.handles.remove(handle)
            }
            return
        }

        if (!this.queue.offer(span)) {
            this.counts.dropped++
            this.metrics.incrementCounter(MetricNames.traceExportDropped)
            this.logger.debug({ spanId: span.id, queued: this.queue.size }, 'trace:dropped')
            return
        }
        this.metrics.setGauge(MetricNames.traceExportQueueSize, this.queue.size)
        this.logger.debug({ spanId: span.id, name: span.name }, 'trace:queued')
    }

    private resolveParent(span: Span): SpanContext | undefined {
        if (span.parentId) {
            const direct = this.handles.get(span.parentId)?.context ?? this.closedContexts.get(span.parentId)
            if (direct) return direct
        }
        if (span.name === this.options.rootSpanName) return undefined
        return (
            this.handles.findByName(span.correlationId, this.options.rootSpanName)?.context ??
            this.closedRoots.get(span.correlationId)
        )
    }

    private remember(handle: BackendSpanHandle): void {
        this.closedContexts.set(handle.spanId, handle.context)
        if (handle.name === this.options.rootSpanName) {
            this.closedRoots.set(handle.correlationId, handle.context)
        }
    }

    private async runWorker(): Promise<void> {
        this.logger.debug('trace:worker-start')
        while (!this.queue.isClosed) {
            const span = await this.queue.take(this.pollIntervalMs)
            this.maybeCheckHealth()
            if (span) this.process(span)
        }
        this.logger.debug('trace:worker-stop')
    }

    private process(span: Span): void {
        this.processing = true
        try {
            if (!this.healthy) {
                this.counts.skipped++
                this.metrics.incrementCounter(MetricNames.traceExportSkipped)
                return
            }
            if (!this.tracer) {
                this.counts.skipped++
                this.metrics.incrementCounter(MetricNames.traceExportSkipped)
                return
            }
            const started = Date.now()
            const handle = BackendSpanHandle.open(this.tracer, span, this.resolveParent(span))
            handle.close(span)
            this.remember(handle)
            this.counts.rendered++
            this.metrics.recordHistogram(MetricNames.traceExportLatencyMs, Date.now() - started)
        } catch (error) {
            this.counts.failures++
            this.metrics.incrementCounter(MetricNames.traceExportFailures)
            this.logger.warn({ spanId: span.id, error: errorMessage(error) }, 'trace:render-failed')
        } finally {
            this.metrics.setGauge(MetricNames.traceExportQueueSize, this.queue.size)
            this.processing = false
        }
    }

    private maybeCheckHealth(): void {
        if (Date.now() - this.lastHealthCheck < this.healthCheckIntervalMs) return
        this.checkHealth()
    }

    /** Queue depth is the health proxy: a backed-up queue means the sink cannot keep up. */
    checkHealth(): boolean {
        this.lastHealthCheck = Date.now()
        const depth = this.queue.size
        const healthy = depth <= this.unhealthyQueueDepth
        if (healthy !== this.healthy) {
            this.logger.warn({ depth, healthy }, 'trace:health-changed')
        }
        this.healthy = healthy
        this.metrics.setGauge(MetricNames.collectorHealth, healthy ? 1 : 0)
        return healthy
    }

    markUnhealthy(reason: string): void {
        if (this.healthy) this.logger.warn({ reason }, 'trace:unhealthy')
        this.healthy = false
        this.metrics.setGauge(MetricNames.collectorHealth, 0)
    }

    isHealthy(): boolean {
        return this.healthy
    }

    stats(): TraceExporterStats {
        return {
            queued: this.queue.size,
            liveHandles: this.handles.size,
            ...this.counts,
            healthy: this.healthy,
        }
    }

    /** Resolves true once the queue is empty and nothing is being rendered. */
    async whenDrained(timeoutMs = 5000): Promise<boolean> {
        const deadline = Date.now() + timeoutMs
        while (this.queue.size > 0 || this.processing) {
            if (Date.now() >= deadline) return false
            await sleep(5)
        }
        return true
    }

    async forceFlush(): Promise<void> {
        await this.provider?.forceFlush()
    }

    /** Stops intake, drains within the grace period, flushes the backend and releases it. Idempotent. */
    shutdown(): Promise<void> {
        this.shutdownPromise ??= this.doShutdown()
        return this.shutdownPromise
    }

    private async doShutdown(): Promise<void> {
        this.stopping = true
        this.queue.close()
        if (this.worker) await this.worker

        const deadline = Date.now() + this.shutdownGraceMs
        let remaining = 0
        for (let span = this.queue.poll(); span !== undefined; span = this.queue.poll()) {
            if (Date.now() >= deadline) {
                remaining++
                continue
            }
            this.process(span)
        }
        if (remaining > 0) {
            this.counts.dropped += remaining
            this.metrics.incrementCounter(MetricNames.traceExportDropped, remaining)
            this.logger.warn({ remaining }, 'trace:shutdown-dropped')
        }

        if (this.provider) {
            try {
                const flushed = await settleWithin(this.provider.forceFlush(), this.shutdownGraceMs)
                if (!flushed) this.logger.warn({ graceMs: this.shutdownGraceMs }, 'trace:flush-timeout')
            } catch (error) {
                this.logger.warn({ error: errorMessage(error) }, 'trace:flush-failed')
            }
            try {
                await this.provider.shutdown()
            } catch (error) {
                this.logger.warn({ error: errorMessage(error) }, 'trace:shutdown-failed')
            }
        }

        this.detach()
        this.handles.clear()
        this.closedContexts.clear()
        this.closedRoots.clear()
        this.tracer = null
        this.provider = null
        this.logger.info({ ...this.counts }, 'trace:shutdown')
    }
}
