import { randomUUID } from 'node:crypto'
import type { TypedEventEmitter } from '../core/events.js'
import { RingBuffer } from '../core/ring-buffer.js'
import type { Logger } from '../logger/index.js'
import type { Span, StartSpanOptions } from './types.js'

export interface TracerOptions {
    /** Completed spans kept for `getTrace`/`getRecent`; oldest are evicted. */
    maxSpans?: number
}

/**
 * Span registry. Open spans live in the active table until ended, then move to
 * a bounded ring of recent spans. Start and end are announced on the event bus,
 * which is how the trace exporter and metrics recorder see them.
 */
export class Tracer {
    private active = new Map<string, Span>()
    private recent: RingBuffer<Span>

    constructor(
        private logger: Logger,
        private eventBus: TypedEventEmitter,
        options: TracerOptions = {}
    ) {
        this.recent = new RingBuffer<Span>(options.maxSpans ?? 1000)
    }

    startSpan(name: string, options: StartSpanOptions): Span {
        const span: Span = {
            id: randomUUID(),
            name,
            correlationId: options.correlationId,
            parentId: options.parentId,
            startTime: Date.now(),
            tags: { ...options.tags },
            events: [],
        }
        this.active.set(span.id, span)
        this.logger.debug({ spanId: span.id, name, correlationId: span.correlationId, parentId: span.parentId }, 'span:start')
        this.eventBus.emit('span:start', { span })
        return span
    }

    /** Returns the duration in ms, or null when the span was already ended. */
    endSpan(span: Span): number | null {
        if (span.endTime !== undefined || !this.active.has(span.id)) {
            this.logger.warn({ spanId: span.id, name: span.name }, 'span:double-end')
            return null
        }
        span.endTime = Math.max(Date.now(), span.startTime)
        const durationMs = span.endTime - span.startTime
        this.active.delete(span.id)
        this.recent.push(span)
        this.logger.debug({ spanId: span.id, name: span.name, durationMs }, 'span:end')
        this.eventBus.emit('span:end', { span, durationMs })
        return durationMs
    }

    addEvent(span: Span, fields: Record<string, unknown>): void {
        span.events.push({ timestamp: Date.now(), fields })
    }

    setTag(span: Span, key: string, value: string): void {
        span.tags[key] = value
    }

    getActive(spanId: string): Span | undefined {
        return this.active.get(spanId)
    }

    /** Most recently started open span with this name in the correlation. */
    findActive(correlationId: string, name: string): Span | undefined {
        let match: Span | undefined
        for (const span of this.active.values()) {
            if (span.correlationId === correlationId && span.name === name) match = span
        }
        return match
    }

    getActiveSpans(): Span[] {
        return [...this.active.values()]
    }

    /** Every known span of one correlation, open or finished, by start time. */
    getTrace(correlationId: string): Span[] {
        const spans = [
            ...this.recent.toArray().filter((s) => s.correlationId === correlationId),
            ...[...this.active.values()].filter((s) => s.correlationId === correlationId),
        ]
        return spans.sort((a, b) => a.startTime - b.startTime)
    }

    /** Adds already finished spans, e.g. reloaded from disk, without announcing them. */
    restore(spans: readonly Span[]): void {
        for (const span of spans) {
            if (span.endTime !== undefined && !this.active.has(span.id)) this.recent.push(span)
        }
    }

    getRecent(limit = 100): Span[] {
        return this.recent.last(limit)
    }
}
