/**
 * @module sensor/queue
 * @description Bounded frame queue with timed waits
 */

interface Waiter<T> {
    resolve: (item: T | null) => void;
    timer: ReturnType<typeof setTimeout>;
}

/**
 * FIFO of decoded frames between the packet handler and the consumer.
 *
 * With a capacity, offers made while the queue is full are dropped so the
 * consumer never falls behind the sensor.
 *
 * @example
 * ```typescript
 * const queue = new FrameQueue<Frame>(2);
 * queue.offer(frame);
 * const next = await queue.take(1000); // null after 1s without a frame
 * ```
 */
export class FrameQueue<T> {
    private items: T[] = [];
    private waiters: Waiter<T>[] = [];

    /**
     * @param capacity - Maximum queued items, 0 for unbounded
     */
    constructor(private readonly capacity: number = 0) { }

    get size(): number {
        return this.items.length;
    }

    isFull(): boolean {
        return this.capacity > 0 && this.items.length >= this.capacity;
    }

    /**
     * Add an item
     *
     * @returns False if the queue was full and the item was dropped
     */
    offer(item: T): boolean {
        const waiter = this.waiters.shift();
        if (waiter) {
            clearTimeout(waiter.timer);
            waiter.resolve(item);
            return true;
        }
        if (this.isFull()) return false;
        this.items.push(item);
        return true;
    }

    /**
     * Remove and return the oldest item, or null when empty
     */
    poll(): T | null {
        return this.items.shift() ?? null;
    }

    /**
     * Wait up to `timeoutMs` for an item
     *
     * Resolves null on timeout or when `interrupt()` is called.
     */
    take(timeoutMs: number): Promise<T | null> {
        const item = this.poll();
        if (item !== null) return Promise.resolve(item);

        return new Promise<T | null>((resolve) => {
            const waiter: Waiter<T> = {
                resolve,
                timer: setTimeout(() => {
                    this.waiters = this.waiters.filter((w) => w !== waiter);
                    resolve(null);
                }, timeoutMs),
            };
            this.waiters.push(waiter);
        });
    }

    /**
     * Wake every pending `take` with null
     */
    interrupt(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            clearTimeout(waiter.timer);
            waiter.resolve(null);
        }
    }

    clear(): void {
        this.items = [];
    }
}
