import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('agent:start', handler)
        emitter.emit('agent:start', { agent: 'planner', correlationId: 'c1' })

        expect(handler).toHaveBeenCalledWith({ agent: 'planner', correlationId: 'c1' })
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('workflow:start', h1)
        emitter.on('workflow:start', h2)
        emitter.emit('workflow:start', { correlationId: 'c1' })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
        expect(emitter.listenerCount('workflow:start')).toBe(2)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('agent:complete', handler)
        emitter.off('agent:complete', handler)
        emitter.emit('agent:complete', { agent: 'executor', correlationId: 'c1', durationMs: 100 })

        expect(handler).not.toHaveBeenCalled()
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('agent:start', handler)
        emitter.removeAll()
        emitter.emit('agent:start', { agent: 'planner', correlationId: 'c1' })

        expect(handler).not.toHaveBeenCalled()
    })

    it('swallows handler exceptions', () => {
        const emitter = new TypedEventEmitter()
        const badHandler = vi.fn(() => {
            throw new Error('boom')
        })
        const goodHandler = vi.fn()

        emitter.on('workflow:start', badHandler)
        emitter.on('workflow:start', goodHandler)

        expect(() => emitter.emit('workflow:start', { correlationId: 'c1' })).not.toThrow()
        expect(goodHandler).toHaveBeenCalledTimes(1)
    })
})
