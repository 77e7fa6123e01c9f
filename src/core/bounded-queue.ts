/**
 * Fixed-capacity FIFO between ingress and the dispatch pool.
 *
 * `offer` never waits: a full queue rejects the new item and leaves the
 * queued ones untouched (drop-new). `take` waits only while the queue is
 * empty; consumers parked in `take` are handed items directly by `offer`.
 */
export class BoundedQueue<T> {
    private items: T[] = []
    private head = 0
    private waiters: Array<(item: T | null) => void> = []
    private closed = false
    private readonly capacity: number

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new Error('Queue capacity must be a positive integer')
        }
        this.capacity = capacity
    }

    /**
     * @returns false when the queue is full or closed
     */
    offer(item: T): boolean {
        if (this.closed) return false

        const waiter = this.waiters.shift()
        if (waiter) {
            waiter(item)
            return true
        }

        if (this.size >= this.capacity) return false

        this.items.push(item)
        return true
    }

    /**
     * Resolves with the oldest item, or null once the queue is closed and
     * nothing is left in it.
     */
    take(): Promise<T | null> {
        if (this.size > 0) {
            return Promise.resolve(this.shift())
        }
        if (this.closed) return Promise.resolve(null)

        return new Promise(resolve => {
            this.waiters.push(resolve)
        })
    }

    close(): void {
        if (this.closed) return
        this.closed = true
        for (const waiter of this.waiters.splice(0)) {
            waiter(null)
        }
    }

    get size(): number {
        return this.items.length - this.head
    }

    getCapacity(): number {
        return this.capacity
    }

    private shift(): T {
        const item = this.items[this.head]
        this.head++
        // compact once the consumed prefix dominates the backing array
        if (this.head > 1024 && this.head * 2 > this.items.length) {
            this.items = this.items.slice(this.head)
            this.head = 0
        }
        return item
    }
}
