type Waiter<T> = (item: T | undefined) => void

/**
 * Single-consumer hand-off queue with a fixed capacity. `offer` never waits:
 * it returns false when the queue is full or closed, and the caller decides
 * what shedding means.
 */
export class BoundedQueue<T> {
    private items: T[] = []
    private waiters: Waiter<T>[] = []
    private closed = false

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`BoundedQueue capacity must be a positive integer, got ${capacity}`)
        }
    }

    get size(): number {
        return this.items.length
    }

    get isClosed(): boolean {
        return this.closed
    }

    offer(item: T): boolean {
        if (this.closed) return false
        const waiter = this.waiters.shift()
        if (waiter) {
            waiter(item)
            return true
        }
        if (this.items.length >= this.capacity) return false
        this.items.push(item)
        return true
    }

    poll(): T | undefined {
        return this.items.shift()
    }

    /** Resolves with the next item, or `undefined` on timeout or once closed and empty. */
    take(timeoutMs: number): Promise<T | undefined> {
        const next = this.items.shift()
        if (next !== undefined) return Promise.resolve(next)
        if (this.closed) return Promise.resolve(undefined)

        return new Promise((resolve) => {
            const waiter: Waiter<T> = (item) => {
                clearTimeout(timer)
                resolve(item)
            }
            const timer = setTimeout(() => {
                const idx = this.waiters.indexOf(waiter)
                if (idx !== -1) this.waiters.splice(idx, 1)
                resolve(undefined)
            }, timeoutMs)
            timer.unref()
            this.waiters.push(waiter)
        })
    }

    /** Rejects further offers and wakes any pending `take`. Queued items stay pollable. */
    close(): void {
        this.closed = true
        const waiters = this.waiters
        this.waiters = []
        for (const waiter of waiters) waiter(undefined)
    }
}
