import { describe, it, expect, beforeEach } from 'vitest';
import { AppEvents, ServiceError } from '@perch/shared';
import type { AppEvent } from '@perch/shared';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';
import { createHarness, flush, user } from '../test-utils.js';
import type { RecordingSink } from '../test-utils.js';
import type { EventBus } from '../events/event-bus.js';

/** Records what it sees; `send_message` text drives failures */
class ProbePresenter extends Presenter {
    readonly seen: string[] = [];

    constructor(context: PresenterContext) {
        super('ProbePresenter', context);
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type !== 'user' || event.payload.type !== 'send_message') return;
        const text = event.payload.text;
        this.seen.push(text);

        if (text === 'service-fail') {
            await this.attempt('Probe Failed', () => Promise.reject(ServiceError.storage('disk full')));
        } else if (text === 'crash') {
            throw new Error('handler bug');
        }
    }
}

const send = (text: string): AppEvent => user({ type: 'send_message', text });

let bus: EventBus<AppEvent>;
let sink: RecordingSink;
let presenter: ProbePresenter;

beforeEach(() => {
    ({ bus, sink } = createHarness(8));
    presenter = new ProbePresenter({ bus, sink });
});

// ─── lifecycle ───────────────────────────────────────────────────

describe('lifecycle', () => {
    it('start is idempotent', () => {
        presenter.start();
        presenter.start();
        expect(presenter.isRunning()).toBe(true);
        expect(bus.subscriberCount).toBe(1);
    });

    it('processes events in publish order', async () => {
        presenter.start();
        for (const text of ['First', 'Second', 'Third']) bus.publish(send(text));
        await flush();
        expect(presenter.seen).toEqual(['First', 'Second', 'Third']);
    });

    it('stop lowers the flag and the loop exits on the next event without handling it', async () => {
        presenter.start();
        presenter.stop();
        expect(presenter.isRunning()).toBe(false);
        expect(bus.subscriberCount).toBe(1);

        bus.publish(send('after stop'));
        await presenter.join();
        expect(presenter.seen).toEqual([]);
        expect(bus.subscriberCount).toBe(0);
    });

    it('restarting after stop leaves exactly one live loop', async () => {
        presenter.start();
        presenter.stop();
        presenter.start();
        await flush();
        expect(bus.subscriberCount).toBe(1);

        bus.publish(send('once'));
        await flush();
        expect(presenter.seen).toEqual(['once']);
    });

    it('exits when the bus closes', async () => {
        presenter.start();
        bus.close();
        await presenter.join();
        expect(presenter.isRunning()).toBe(false);
    });

    it('exits after handling app_will_terminate', async () => {
        presenter.start();
        bus.publish(AppEvents.system({ type: 'app_will_terminate' }));
        await presenter.join();
        expect(presenter.isRunning()).toBe(false);
        expect(bus.subscriberCount).toBe(0);
    });

    it('keeps going after lagging behind the bus', async () => {
        presenter.start();
        // Nine events on a ring of eight, published before the loop can read
        for (let i = 0; i < 9; i++) bus.publish(send(`e${i}`));
        await flush();
        expect(presenter.seen).toEqual(['e1', 'e2', 'e3', 'e4', 'e5', 'e6', 'e7', 'e8']);

        bus.publish(send('later'));
        await flush();
        expect(presenter.seen.at(-1)).toBe('later');
        expect(presenter.isRunning()).toBe(true);
    });
});

// ─── errors ──────────────────────────────────────────────────────

describe('error handling', () => {
    it('turns a service failure into exactly one show_error', async () => {
        presenter.start();
        bus.publish(send('service-fail'));
        await flush();

        expect(sink.commands).toEqual([
            { type: 'show_error', title: 'Probe Failed', message: 'Storage error: disk full', severity: 'error' },
        ]);
        expect(presenter.isRunning()).toBe(true);
    });

    it('reports an unexpected handler error as critical and keeps running', async () => {
        presenter.start();
        bus.publish(send('crash'));
        bus.publish(send('next'));
        await flush();

        expect(sink.ofType('show_error')).toEqual([
            { type: 'show_error', title: 'Unexpected Error', message: 'handler bug', severity: 'critical' },
        ]);
        expect(presenter.seen).toEqual(['crash', 'next']);
    });
});
