import { toError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { RingBuffer } from '../core/ring-buffer.js'
import type { Logger } from '../logger/index.js'

export interface ErrorTags {
    correlationId?: string
    agentName?: string
    context?: Record<string, unknown>
}

export interface ErrorRecord {
    errorType: string
    errorMessage: string
    stack?: string
    correlationId?: string
    agentName?: string
    timestamp: number
    context: Record<string, unknown>
    /** Occurrences of this `type:message` key so far, this one included. */
    count: number
}

export interface ErrorSummary {
    totalErrors: number
    errorCounts: Record<string, number>
    recentErrors: Array<{
        errorType: string
        errorMessage: string
        correlationId?: string
        agentName?: string
        timestamp: string
        count: number
    }>
}

const KEY_MESSAGE_LENGTH = 100
const SUMMARY_MESSAGE_LENGTH = 200

export function errorKey(error: Error): string {
    return `${error.name}:${error.message.slice(0, KEY_MESSAGE_LENGTH)}`
}

/**
 * Keeps the most recent errors in a bounded ring and counts occurrences per
 * `type:message` key for the life of the process.
 */
export class ErrorTracker {
    private errors: RingBuffer<ErrorRecord>
    private counts = new Map<string, number>()
    private cleanups: Array<() => void> = []

    constructor(
        private readonly logger: Logger,
        maxErrors = 1000
    ) {
        this.errors = new RingBuffer<ErrorRecord>(maxErrors)
    }

    record(error: unknown, tags: ErrorTags = {}): ErrorRecord {
        const e = toError(error)
        const key = errorKey(e)
        const count = (this.counts.get(key) ?? 0) + 1
        this.counts.set(key, count)

        const record: ErrorRecord = {
            errorType: e.name,
            errorMessage: e.message,
            stack: e.stack,
            correlationId: tags.correlationId,
            agentName: tags.agentName,
            timestamp: Date.now(),
            context: { ...tags.context },
            count,
        }
        this.errors.push(record)
        this.logger.error(
            { err: e, correlationId: record.correlationId, agent: record.agentName, count },
            'error:recorded'
        )
        return record
    }

    /** Records every `agent:error` published on the bus. */
    attach(eventBus: TypedEventEmitter): void {
        const onError = ({ agent, correlationId, error }: { agent: string; correlationId: string; error: Error }) => {
            this.record(error, { correlationId, agentName: agent })
        }
        eventBus.on('agent:error', onError)
        this.cleanups.push(() => eventBus.off('agent:error', onError))
    }

    detach(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    get size(): number {
        return this.errors.size
    }

    summary(recent = 10): ErrorSummary {
        return {
            totalErrors: this.errors.size,
            errorCounts: Object.fromEntries(this.counts),
            recentErrors: this.errors.last(recent).map((r) => ({
                errorType: r.errorType,
                errorMessage: r.errorMessage.slice(0, SUMMARY_MESSAGE_LENGTH),
                correlationId: r.correlationId,
                agentName: r.agentName,
                timestamp: new Date(r.timestamp).toISOString(),
                count: r.count,
            })),
        }
    }

    byType(errorType: string): ErrorRecord[] {
        return this.errors.toArray().filter((r) => r.errorType === errorType)
    }

    byCorrelation(correlationId: string): ErrorRecord[] {
        return this.errors.toArray().filter((r) => r.correlationId === correlationId)
    }

    reset(): void {
        this.errors.clear()
        this.counts.clear()
    }
}
