import { describe, it, expect } from 'vitest';
import { BoundedChannel } from './channel.js';

interface Item {
    readonly n: number;
}

describe('BoundedChannel', () => {
    it('refuses the newest value when full', () => {
        const ch = new BoundedChannel<Item>(2);
        expect(ch.trySend({ n: 1 })).toBe('ok');
        expect(ch.trySend({ n: 2 })).toBe('ok');
        expect(ch.trySend({ n: 3 })).toBe('full');
        expect(ch.drain()).toEqual([{ n: 1 }, { n: 2 }]);
    });

    it('drains in FIFO order and leaves the channel empty', () => {
        const ch = new BoundedChannel<Item>(8);
        for (let n = 0; n < 5; n++) ch.trySend({ n });
        expect(ch.size).toBe(5);
        expect(ch.drain().map((i) => i.n)).toEqual([0, 1, 2, 3, 4]);
        expect(ch.isEmpty).toBe(true);
        expect(ch.drain()).toEqual([]);
    });

    it('recv waits for a value', async () => {
        const ch = new BoundedChannel<Item>(1);
        const pending = ch.recv();
        ch.trySend({ n: 42 });
        expect(await pending).toEqual({ n: 42 });
    });

    it('delivers remaining values after close, then undefined', async () => {
        const ch = new BoundedChannel<Item>(4);
        ch.trySend({ n: 1 });
        ch.close();
        expect(ch.trySend({ n: 2 })).toBe('closed');
        expect(await ch.recv()).toEqual({ n: 1 });
        expect(await ch.recv()).toBeUndefined();
    });

    it('wakes a waiting receiver on close', async () => {
        const ch = new BoundedChannel<Item>(4);
        const pending = ch.recv();
        ch.close();
        expect(await pending).toBeUndefined();
    });

    it('tryRecv takes one value without waiting', () => {
        const ch = new BoundedChannel<Item>(4);
        expect(ch.tryRecv()).toBeUndefined();
        ch.trySend({ n: 7 });
        expect(ch.tryRecv()).toEqual({ n: 7 });
    });
});
