/** Fixed-capacity FIFO; pushing onto a full buffer evicts the oldest entry. */
export class RingBuffer<T> {
    private items: (T | undefined)[]
    private start = 0
    private count = 0

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`)
        }
        this.items = new Array<T | undefined>(capacity)
    }

    get size(): number {
        return this.count
    }

    push(item: T): T | undefined {
        const index = (this.start + this.count) % this.capacity
        if (this.count < this.capacity) {
            this.items[index] = item
            this.count++
            return undefined
        }
        const evicted = this.items[this.start]
        this.items[this.start] = item
        this.start = (this.start + 1) % this.capacity
        return evicted
    }

    /** Oldest first. */
    toArray(): T[] {
        const out: T[] = []
        for (let i = 0; i < this.count; i++) {
            const item = this.items[(this.start + i) % this.capacity]
            if (item !== undefined) out.push(item)
        }
        return out
    }

    last(n: number): T[] {
        if (n <= 0) return []
        const all = this.toArray()
        return all.slice(Math.max(0, all.length - n))
    }

    clear(): void {
        this.items = new Array<T | undefined>(this.capacity)
        this.start = 0
        this.count = 0
    }
}
