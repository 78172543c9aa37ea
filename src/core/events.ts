import type { TokenUsage } from '../metrics/cost.js'
import type { PolicyDecision } from '../policy/types.js'
import type { Span } from '../tracing/types.js'

export type EventMap = {
    'span:start': { span: Span }
    'span:end': { span: Span; durationMs: number }
    'workflow:start': { correlationId: string }
    'workflow:complete': { correlationId: string; durationMs: number }
    'workflow:error': { correlationId: string; durationMs: number; error: Error }
    'agent:start': { agent: string; correlationId: string }
    'agent:complete': { agent: string; correlationId: string; durationMs: number }
    'agent:error': { agent: string; correlationId: string; error: Error }
    'token:usage': { agent: string; correlationId: string; usage: TokenUsage }
    'decision:recorded': { decision: PolicyDecision }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<keyof EventMap, Set<EventHandler<never>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                ;(handler as EventHandler<EventMap[K]>)(data)
            } catch {
                // listeners are cross-cutting and must not break the producer
            }
        }
    }

    listenerCount(event: keyof EventMap): number {
        return this.handlers.get(event)?.size ?? 0
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
