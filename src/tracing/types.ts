export interface SpanEvent {
    timestamp: number
    fields: Record<string, unknown>
}

/**
 * Local span record. `endTime` stays unset while the span is open; an open
 * span is never exported as finished.
 */
export interface Span {
    id: string
    name: string
    correlationId: string
    parentId?: string
    startTime: number
    endTime?: number
    tags: Record<string, string>
    events: SpanEvent[]
}

export interface StartSpanOptions {
    correlationId: string
    parentId?: string
    tags?: Record<string, string>
}
