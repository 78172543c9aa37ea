import {
    ROOT_CONTEXT,
    SpanStatusCode,
    trace,
    type Span as BackendSpan,
    type SpanContext,
    type Tracer as BackendTracer,
} from '@opentelemetry/api'
import { eventAttributes, eventName, spanAttributes } from './attributes.js'
import type { Span } from './types.js'

/**
 * Two-phase reference to a backend span: `open` at local span start, so
 * children started before the parent finishes get the right trace id, then
 * `close` once the local span has ended.
 */
export class BackendSpanHandle {
    private closed = false

    private constructor(
        readonly spanId: string,
        readonly correlationId: string,
        readonly name: string,
        private readonly backend: BackendSpan
    ) {}

    static open(tracer: BackendTracer, span: Span, parent?: SpanContext): BackendSpanHandle {
        const ctx = parent ? trace.setSpanContext(ROOT_CONTEXT, parent) : ROOT_CONTEXT
        const backend = tracer.startSpan(
            span.name,
            { startTime: span.startTime, attributes: spanAttributes(span), root: parent === undefined },
            ctx
        )
        return new BackendSpanHandle(span.id, span.correlationId, span.name, backend)
    }

    get context(): SpanContext {
        return this.backend.spanContext()
    }

    get traceId(): string {
        return this.backend.spanContext().traceId
    }

    get isClosed(): boolean {
        return this.closed
    }

    /** Copies tags and events gathered since `open` onto the backend span and ends it. */
    close(span: Span): void {
        if (this.closed) return
        if (span.endTime === undefined) {
            throw new Error(`Span ${span.id} is still open`)
        }
        this.backend.setAttributes(spanAttributes(span))
        for (const event of span.events) {
            this.backend.addEvent(eventName(event.fields), eventAttributes(event.fields), event.timestamp)
        }
        if (span.tags.error === 'true') {
            this.backend.setStatus({ code: SpanStatusCode.ERROR, message: span.tags['error.message'] })
        } else {
            this.backend.setStatus({ code: SpanStatusCode.OK })
        }
        this.backend.end(span.endTime)
        this.closed = true
    }
}

/**
 * Live handles by span id, plus a `(correlationId, name)` index used only as
 * the fallback parent lookup for the workflow root span.
 */
export class HandleIndex {
    private byId = new Map<string, BackendSpanHandle>()
    private byName = new Map<string, Map<string, BackendSpanHandle>>()

    get size(): number {
        return this.byId.size
    }

    add(handle: BackendSpanHandle): void {
        this.byId.set(handle.spanId, handle)
        let names = this.byName.get(handle.correlationId)
        if (!names) {
            names = new Map()
            this.byName.set(handle.correlationId, names)
        }
        names.set(handle.name, handle)
    }

    get(spanId: string): BackendSpanHandle | undefined {
        return this.byId.get(spanId)
    }

    findByName(correlationId: string, name: string): BackendSpanHandle | undefined {
        return this.byName.get(correlationId)?.get(name)
    }

    remove(handle: BackendSpanHandle): void {
        if (this.byId.get(handle.spanId) === handle) this.byId.delete(handle.spanId)
        const names = this.byName.get(handle.correlationId)
        if (names?.get(handle.name) === handle) {
            names.delete(handle.name)
            if (names.size === 0) this.byName.delete(handle.correlationId)
        }
    }

    clear(): void {
        this.byId.clear()
        this.byName.clear()
    }
}
