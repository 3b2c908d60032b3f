/**
 * @perch/core: Event Bus
 *
 * Capacity-bounded broadcast channel. Every subscriber reads the same
 * ring of recent events through its own cursor, so a publisher never
 * waits on a slow reader. A reader whose cursor falls behind the oldest
 * retained event is told how many it missed (`lagged`) and moved forward
 * to the oldest event still in the ring.
 *
 *   publish ─▶ [ ring of `capacity` events, tagged by sequence ]
 *                  ▲ cursor A          ▲ cursor B
 */

import { createLogger } from '@perch/shared';

const log = createLogger('EventBus');

// ─── Types ────────────────────────────────────────────────────────

export type PublishResult =
    | { readonly ok: true; readonly receivers: number }
    | { readonly ok: false; readonly reason: 'no_subscribers' | 'closed' };

export type RecvResult<E> =
    | { readonly status: 'event'; readonly event: E }
    | { readonly status: 'lagged'; readonly skipped: number }
    | { readonly status: 'closed' };

export type TryRecvResult<E> = RecvResult<E> | { readonly status: 'empty' };

/** Anything that can put events on the bus; what services receive */
export interface EventPublisher<E> {
    publish(event: E): PublishResult;
}

type RingRead<E> =
    | { readonly kind: 'event'; readonly event: E; readonly next: number }
    | { readonly kind: 'lagged'; readonly skipped: number; readonly next: number }
    | { readonly kind: 'empty' };

// ─── Event Bus ────────────────────────────────────────────────────

export class EventBus<E> implements EventPublisher<E> {
    readonly capacity: number;

    private readonly ring: ({ readonly value: E } | undefined)[];
    /** Sequence number the next published event will get */
    private head = 0;
    private readonly subscribers = new Set<Subscription<E>>();
    private closed = false;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`EventBus capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.ring = new Array<{ readonly value: E } | undefined>(capacity).fill(undefined);
    }

    /** New independent reader starting after the latest event; no replay */
    subscribe(): Subscription<E> {
        const subscription = new Subscription<E>(this, this.head);
        if (this.closed) {
            subscription.unsubscribe();
            return subscription;
        }
        this.subscribers.add(subscription);
        return subscription;
    }

    publish(event: E): PublishResult {
        if (this.closed) return { ok: false, reason: 'closed' };

        const receivers = this.subscribers.size;
        if (receivers === 0) return { ok: false, reason: 'no_subscribers' };

        this.ring[this.head % this.capacity] = { value: event };
        this.head++;

        for (const subscription of this.subscribers) {
            subscription.wake();
        }
        return { ok: true, receivers };
    }

    get subscriberCount(): number {
        return this.subscribers.size;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Tear the bus down. Readers still receive what is buffered for them,
     * then `closed`; later publishes fail with `closed`.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        log.debug(`Closing with ${this.subscribers.size} subscriber(s)`);
        for (const subscription of this.subscribers) {
            subscription.wake();
        }
    }

    // ── Internal (used by Subscription) ───────────────────────────

    /** @internal */
    readAt(cursor: number): RingRead<E> {
        const oldest = Math.max(0, this.head - this.capacity);
        if (cursor < oldest) {
            return { kind: 'lagged', skipped: oldest - cursor, next: oldest };
        }
        if (cursor < this.head) {
            const slot = this.ring[cursor % this.capacity];
            if (slot === undefined) {
                throw new Error(`EventBus ring slot for sequence ${cursor} is empty`);
            }
            return { kind: 'event', event: slot.value, next: cursor + 1 };
        }
        return { kind: 'empty' };
    }

    /** @internal */
    detach(subscription: Subscription<E>): void {
        this.subscribers.delete(subscription);
    }
}

// ─── Subscription ─────────────────────────────────────────────────

export class Subscription<E> {
    private cursor: number;
    private dropped = false;
    private waiters: Array<() => void> = [];

    /** @internal */
    constructor(
        private readonly bus: EventBus<E>,
        start: number,
    ) {
        this.cursor = start;
    }

    /** Wait for the next event, a lag notice, or closure */
    async recv(): Promise<RecvResult<E>> {
        for (;;) {
            const result = this.tryRecv();
            if (result.status !== 'empty') return result;
            await new Promise<void>((resolve) => {
                this.waiters.push(resolve);
            });
        }
    }

    tryRecv(): TryRecvResult<E> {
        if (this.dropped) return { status: 'closed' };

        const read = this.bus.readAt(this.cursor);
        switch (read.kind) {
            case 'event':
                this.cursor = read.next;
                return { status: 'event', event: read.event };
            case 'lagged':
                this.cursor = read.next;
                return { status: 'lagged', skipped: read.skipped };
            case 'empty':
                return this.bus.isClosed ? { status: 'closed' } : { status: 'empty' };
        }
    }

    /** Stop counting this reader; a pending recv resolves `closed` */
    unsubscribe(): void {
        if (this.dropped) return;
        this.dropped = true;
        this.bus.detach(this);
        this.wake();
    }

    /** True once nothing more can be received */
    get closed(): boolean {
        if (this.dropped) return true;
        return this.bus.isClosed && this.bus.readAt(this.cursor).kind === 'empty';
    }

    /** @internal */
    wake(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) resolve();
    }
}
