/**
 * @perch/core: Bounded Channel
 *
 * Single-consumer FIFO with a fixed capacity. Senders never wait: a full
 * channel refuses the newest value. The receiving side can either await
 * values (`recv`) or take whatever is queued right now (`drain`).
 */

export type SendResult = 'ok' | 'full' | 'closed';

export class BoundedChannel<T extends object> {
    readonly capacity: number;

    private readonly buffer: T[] = [];
    private waiters: Array<() => void> = [];
    private closed = false;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    trySend(value: T): SendResult {
        if (this.closed) return 'closed';
        if (this.buffer.length >= this.capacity) return 'full';

        this.buffer.push(value);
        this.wake();
        return 'ok';
    }

    /** Next value, or undefined once the channel is closed and empty */
    async recv(): Promise<T | undefined> {
        for (;;) {
            const value = this.buffer.shift();
            if (value !== undefined) return value;
            if (this.closed) return undefined;
            await new Promise<void>((resolve) => {
                this.waiters.push(resolve);
            });
        }
    }

    tryRecv(): T | undefined {
        return this.buffer.shift();
    }

    /** Everything queued, oldest first */
    drain(): T[] {
        return this.buffer.splice(0, this.buffer.length);
    }

    get size(): number {
        return this.buffer.length;
    }

    get isEmpty(): boolean {
        return this.buffer.length === 0;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Refuse further sends; a waiting receiver gets the remaining values then undefined */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.wake();
    }

    private wake(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) resolve();
    }
}
