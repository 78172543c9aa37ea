import { ExportResultCode, type ExportResult } from '@opentelemetry/core'
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { MetricNames } from '../../../src/metrics/names.js'
import { ROOT, RecordingExporter, createTracingHarness } from '../../helpers/tracing.js'

class FailingExporter implements SpanExporter {
    calls = 0

    export(_spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        this.calls++
        resultCallback({ code: ExportResultCode.FAILED, error: new Error('collector down') })
    }

    async shutdown(): Promise<void> {}
}

const harnesses: Array<ReturnType<typeof createTracingHarness>> = []

function harness(...args: Parameters<typeof createTracingHarness>) {
    const h = createTracingHarness(...args)
    harnesses.push(h)
    return h
}

afterEach(async () => {
    await Promise.all(harnesses.map((h) => h.exporter.shutdown()))
    harnesses.length = 0
})

describe('TraceExporter live handles', () => {
    it('puts every span of one correlation under one trace id', async () => {
        const { tracer, exporter, memory } = harness()
        exporter.initialize()

        const root = tracer.startSpan(ROOT, { correlationId: 'c1' })
        const agent = tracer.startSpan('svc.agent.planner.run', { correlationId: 'c1', parentId: root.id })
        const tool = tracer.startSpan('svc.tool.search.call', { correlationId: 'c1', parentId: agent.id })
        const orphan = tracer.startSpan('svc.agent.reviewer.run', { correlationId: 'c1' })
        tracer.endSpan(tool)
        tracer.endSpan(agent)
        tracer.endSpan(orphan)
        tracer.endSpan(root)
        await exporter.forceFlush()

        const spans = memory.getFinishedSpans()
        expect(spans).toHaveLength(4)
        const traceIds = new Set(spans.map((s) => s.spanContext().traceId))
        expect(traceIds.size).toBe(1)

        const byName = new Map(spans.map((s) => [s.name, s]))
        const rootSpanId = byName.get(ROOT)?.spanContext().spanId
        expect(byName.get('svc.agent.planner.run')?.parentSpanContext?.spanId).toBe(rootSpanId)
        expect(byName.get('svc.agent.reviewer.run')?.parentSpanContext?.spanId).toBe(rootSpanId)
        expect(byName.get('svc.tool.search.call')?.parentSpanContext?.spanId).toBe(
            byName.get('svc.agent.planner.run')?.spanContext().spanId
        )
        expect(exporter.stats().liveHandles).toBe(0)
    })

    it('keeps separate correlations in separate traces', async () => {
        const { tracer, exporter, memory } = harness()
        exporter.initialize()

        const a = tracer.startSpan(ROOT, { correlationId: 'a' })
        const b = tracer.startSpan(ROOT, { correlationId: 'b' })
        tracer.endSpan(a)
        tracer.endSpan(b)
        await exporter.forceFlush()

        const [first, second] = memory.getFinishedSpans()
        expect(first?.spanContext().traceId).not.toBe(second?.spanContext().traceId)
    })

    it('never exports a span that was not ended', async () => {
        const { tracer, exporter, memory } = harness()
        exporter.initialize()

        const root = tracer.startSpan(ROOT, { correlationId: 'c1' })
        tracer.startSpan('svc.agent.planner.run', { correlationId: 'c1', parentId: root.id })
        tracer.endSpan(root)
        await exporter.forceFlush()

        expect(memory.getFinishedSpans().map((s) => s.name)).toEqual([ROOT])
        expect(exporter.stats().liveHandles).toBe(1)
    })

    it('renders tags, events and error status', async () => {
        const { tracer, exporter, memory } = harness()
        exporter.initialize()

        const span = tracer.startSpan(ROOT, { correlationId: 'c1', tags: { agent_name: 'planner' } })
        tracer.addEvent(span, { event: 'policy.decision', result: 'deny' })
        tracer.setTag(span, 'error', 'true')
        tracer.setTag(span, 'error.message', 'denied')
        tracer.endSpan(span)
        await exporter.forceFlush()

        const [exported] = memory.getFinishedSpans()
        expect(exported?.attributes['agent.name']).toBe('planner')
        expect(exported?.attributes['correlation.id']).toBe('c1')
        expect(exported?.events.map((e) => e.name)).toEqual(['policy.decision'])
        expect(exported?.events[0]?.attributes).toEqual({ result: 'deny' })
        expect(exported?.status).toEqual({ code: 2, message: 'denied' })
    })
})

describe('TraceExporter queue', () => {
    it('renders spans that ended before initialization', async () => {
        const { tracer, exporter, memory } = harness()

        const root = tracer.startSpan(ROOT, { correlationId: 'c1' })
        const child = tracer.startSpan('svc.agent.planner.run', { correlationId: 'c1', parentId: root.id })
        tracer.endSpan(root)
        tracer.endSpan(child)
        expect(exporter.stats().queued).toBe(2)

        exporter.start()
        expect(await exporter.whenDrained()).toBe(true)
        await exporter.forceFlush()

        const spans = memory.getFinishedSpans()
        expect(spans).toHaveLength(2)
        expect(new Set(spans.map((s) => s.spanContext().traceId)).size).toBe(1)
        expect(exporter.stats().rendered).toBe(2)
    })

    it('drops and counts exactly once per span when the queue is full', () => {
        const { tracer, exporter, metrics } = harness({ queueCapacity: 2, unhealthyQueueDepth: 2 })

        for (let i = 0; i < 3; i++) {
            tracer.endSpan(tracer.startSpan(`span-${i}`, { correlationId: 'c1' }))
        }

        expect(exporter.stats().queued).toBe(2)
        expect(exporter.stats().dropped).toBe(1)
        expect(metrics.getCounter(MetricNames.traceExportDropped)).toBe(1)
    })

    it('skips export while the queue is backed up', async () => {
        const { tracer, exporter, metrics, memory } = harness({ queueCapacity: 5, unhealthyQueueDepth: 1 })

        for (let i = 0; i < 3; i++) {
            tracer.endSpan(tracer.startSpan(`span-${i}`, { correlationId: 'c1' }))
        }
        exporter.start()
        expect(await exporter.whenDrained()).toBe(true)
        await exporter.forceFlush()

        expect(exporter.isHealthy()).toBe(false)
        expect(exporter.stats().skipped).toBe(3)
        expect(metrics.getCounter(MetricNames.traceExportSkipped)).toBe(3)
        expect(metrics.getGauge(MetricNames.collectorHealth)).toBe(0)
        expect(memory.getFinishedSpans()).toHaveLength(0)
    })

    it('derives the unhealthy depth from the capacity', () => {
        expect(harness({ queueCapacity: 100 }).exporter.unhealthyQueueDepth).toBe(50)
        expect(harness({ queueCapacity: 1 }).exporter.unhealthyQueueDepth).toBe(1)
    })

    it('resumes rendering queued spans once health recovers', async () => {
        const { tracer, exporter, metrics, memory } = harness({ healthCheckIntervalMs: 200 })
        const first = tracer.startSpan('svc.agent.planner.run', { correlationId: 'c1' })
        const second = tracer.startSpan('svc.agent.reviewer.run', { correlationId: 'c1' })

        exporter.start()
        exporter.checkHealth()
        exporter.markUnhealthy('collector down')
        tracer.endSpan(first)
        await vi.waitFor(() => expect(exporter.stats().skipped).toBe(1))
        expect(exporter.isHealthy()).toBe(false)

        await vi.waitFor(() => expect(exporter.isHealthy()).toBe(true), { timeout: 2000 })
        expect(metrics.getGauge(MetricNames.collectorHealth)).toBe(1)

        tracer.endSpan(second)
        await vi.waitFor(() => expect(exporter.stats().rendered).toBe(1))
        await exporter.forceFlush()
        expect(memory.getFinishedSpans().map((s) => s.name)).toEqual(['svc.agent.reviewer.run'])
        expect(exporter.stats().skipped).toBe(1)
    })

    it('does nothing when disabled', () => {
        const { tracer, exporter } = harness({ enabled: false })
        exporter.start()
        tracer.endSpan(tracer.startSpan(ROOT, { correlationId: 'c1' }))
        expect(exporter.initialized).toBe(false)
        expect(exporter.stats().queued).toBe(0)
    })
})

describe('TraceExporter backend failures', () => {
    it('marks the backend unhealthy and counts failures', async () => {
        const backend = new FailingExporter()
        const { tracer, exporter, metrics } = harness({}, backend)
        exporter.initialize()

        tracer.endSpan(tracer.startSpan(ROOT, { correlationId: 'c1' }))
        await exporter.forceFlush()

        expect(backend.calls).toBe(1)
        expect(exporter.isHealthy()).toBe(false)
        expect(metrics.getCounter(MetricNames.traceExportFailures)).toBe(1)
    })

    it('retries a failed export before giving up', async () => {
        const backend = new FailingExporter()
        const { tracer, exporter } = harness(
            { retry: { maxAttempts: 3, initialDelayMs: 1, backoffFactor: 1, maxDelayMs: 1, jitter: false } },
            backend
        )
        exporter.initialize()

        tracer.endSpan(tracer.startSpan(ROOT, { correlationId: 'c1' }))
        await exporter.forceFlush()

        expect(backend.calls).toBe(3)
    })
})

describe('TraceExporter shutdown', () => {
    it('drains queued spans and flushes the backend', async () => {
        const backend = new RecordingExporter()
        const { tracer, exporter } = harness({ processor: 'batch' }, backend)
        tracer.endSpan(tracer.startSpan(ROOT, { correlationId: 'c1' }))
        exporter.initialize()

        await exporter.shutdown()

        expect(backend.spans.map((s) => s.name)).toEqual([ROOT])
        expect(exporter.initialized).toBe(false)
    })

    it('is idempotent', async () => {
        const { exporter } = harness()
        exporter.start()
        const first = exporter.shutdown()
        const second = exporter.shutdown()
        expect(second).toBe(first)
        await first
    })

    it('stops accepting spans once shut down', async () => {
        const { tracer, exporter, memory } = harness()
        exporter.start()
        await exporter.shutdown()

        tracer.endSpan(tracer.startSpan(ROOT, { correlationId: 'c1' }))
        expect(memory.getFinishedSpans()).toHaveLength(0)
        expect(exporter.stats().queued).toBe(0)
    })
})
