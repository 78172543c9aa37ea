import { dirname } from 'node:path'
import { z } from 'zod'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { Tracer } from './tracer.js'
import type { Span } from './types.js'

const SpanRecordSchema = z.object({
    span_id: z.string().min(1),
    name: z.string(),
    correlation_id: z.string(),
    parent_span_id: z.string().optional(),
    start_time: z.number(),
    end_time: z.number(),
    duration_ms: z.number().optional(),
    tags: z.record(z.string()).default({}),
    events: z.array(z.object({ timestamp: z.number(), fields: z.record(z.unknown()) })).default([]),
})

export type SpanRecord = z.input<typeof SpanRecordSchema>

export function spanRecord(span: Span): SpanRecord {
    return {
        span_id: span.id,
        name: span.name,
        correlation_id: span.correlationId,
        parent_span_id: span.parentId,
        start_time: span.startTime,
        end_time: span.endTime ?? span.startTime,
        duration_ms: span.endTime === undefined ? undefined : span.endTime - span.startTime,
        tags: span.tags,
        events: span.events,
    }
}

function fromRecord(record: z.output<typeof SpanRecordSchema>): Span {
    return {
        id: record.span_id,
        name: record.name,
        correlationId: record.correlation_id,
        parentId: record.parent_span_id,
        startTime: record.start_time,
        endTime: record.end_time,
        tags: record.tags,
        events: record.events,
    }
}

/**
 * Appends every finished span to a JSONL file and reloads them into a tracer.
 * Writes are chained off the producer path; a failed write is logged and
 * counted, never thrown.
 */
export class SpanFile {
    private chain: Promise<void> = Promise.resolve()
    private cleanups: Array<() => void> = []
    private dirReady = false
    private failed = 0

    constructor(
        private readonly fs: FileSystem,
        readonly path: string,
        private readonly logger: Logger
    ) {}

    get failures(): number {
        return this.failed
    }

    attach(eventBus: TypedEventEmitter): void {
        const onEnd = ({ span }: { span: Span }) => this.append(span)
        eventBus.on('span:end', onEnd)
        this.cleanups.push(() => eventBus.off('span:end', onEnd))
    }

    detach(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    append(span: Span): void {
        if (span.endTime === undefined) return
        const line = `${JSON.stringify(spanRecord(span))}\n`
        this.chain = this.chain.then(() => this.write(line, span.id))
    }

    private async write(line: string, spanId: string): Promise<void> {
        try {
            if (!this.dirReady) {
                await this.fs.mkdir(dirname(this.path))
                this.dirReady = true
            }
            await this.fs.appendText(this.path, line)
        } catch (error) {
            this.failed++
            this.logger.warn({ spanId, path: this.path, error: errorMessage(error) }, 'span:persist-failed')
        }
    }

    /** Resolves once every span appended so far has been written or has failed. */
    flush(): Promise<void> {
        return this.chain
    }

    /** Reads the file into the tracer's recent spans and returns how many were loaded. */
    async load(tracer: Tracer): Promise<number> {
        if (!(await this.fs.exists(this.path))) return 0
        let text: string
        try {
            text = await this.fs.readText(this.path)
        } catch (error) {
            this.logger.warn({ path: this.path, error: errorMessage(error) }, 'span:load-failed')
            return 0
        }

        const spans: Span[] = []
        let skipped = 0
        for (const line of text.split('\n')) {
            if (line.trim() === '') continue
            const parsed = SpanRecordSchema.safeParse(parseLine(line))
            if (parsed.success) spans.push(fromRecord(parsed.data))
            else skipped++
        }
        tracer.restore(spans)
        this.logger.debug({ path: this.path, loaded: spans.length, skipped }, 'span:loaded')
        return spans.length
    }
}

function parseLine(line: string): unknown {
    try {
        return JSON.parse(line)
    } catch {
        return undefined
    }
}
