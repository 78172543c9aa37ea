import type { Attributes } from '@opentelemetry/api'
import type { Span } from './types.js'

export const MAX_ATTRIBUTE_LENGTH = 500

/** Backend attribute keys are dot separated: `tool_name` becomes `tool.name`. */
export function attributeKey(key: string): string {
    return key.replace(/_/g, '.')
}

function stringify(value: unknown): string {
    if (typeof value === 'string') return value
    if (value === null || value === undefined) return String(value)
    if (typeof value === 'object') {
        try {
            return JSON.stringify(value)
        } catch {
            return String(value)
        }
    }
    return String(value)
}

export function attributeValue(value: unknown): string {
    const text = stringify(value)
    return text.length > MAX_ATTRIBUTE_LENGTH ? `${text.slice(0, MAX_ATTRIBUTE_LENGTH)}...` : text
}

export function toAttributes(record: Record<string, unknown>): Attributes {
    const attributes: Attributes = {}
    for (const [key, value] of Object.entries(record)) {
        attributes[attributeKey(key)] = attributeValue(value)
    }
    return attributes
}

export function spanAttributes(span: Span): Attributes {
    const attributes = toAttributes(span.tags)
    attributes['correlation.id'] = span.correlationId
    if (span.parentId) attributes['parent.span.id'] = span.parentId
    return attributes
}

export function eventName(fields: Record<string, unknown>): string {
    const name = fields.event
    return typeof name === 'string' && name.length > 0 ? name : 'log'
}

/** Event fields as backend attributes; the `event` field is already the event name. */
export function eventAttributes(fields: Record<string, unknown>): Attributes {
    const { event: _name, ...rest } = fields
    return toAttributes(rest)
}
