/**
 * @perch/core: Test helpers shared by the presenter and app tests
 */

import { AppEvents } from '@perch/shared';
import type { AppEvent, UserEvent, ViewCommand } from '@perch/shared';
import type { CommandSink } from './bridge/view-command-sink.js';
import { EventBus } from './events/event-bus.js';
import type { EventPublisher, PublishResult } from './events/event-bus.js';

type CommandOf<T extends ViewCommand['type']> = Extract<ViewCommand, { type: T }>;

export class RecordingSink implements CommandSink {
    readonly commands: ViewCommand[] = [];

    send(command: ViewCommand): boolean {
        this.commands.push(command);
        return true;
    }

    ofType<T extends ViewCommand['type']>(type: T): CommandOf<T>[] {
        return this.commands.filter((c): c is CommandOf<T> => c.type === type);
    }

    types(): ViewCommand['type'][] {
        return this.commands.map((c) => c.type);
    }

    clear(): void {
        this.commands.length = 0;
    }
}

type PayloadMap = { [K in AppEvent['type']]: Extract<AppEvent, { type: K }>['payload'] };
type EventOf<F extends AppEvent['type']> = AppEvent & { readonly type: F; readonly payload: PayloadMap[F] };

/** Publisher that keeps every event; stands in for the bus in service tests */
export class RecordingPublisher implements EventPublisher<AppEvent> {
    readonly events: AppEvent[] = [];

    publish(event: AppEvent): PublishResult {
        this.events.push(event);
        return { ok: true, receivers: 1 };
    }

    payloads<F extends AppEvent['type']>(family: F): PayloadMap[F][] {
        const matching = this.events.filter((e): e is EventOf<F> => e.type === family);
        return matching.map((e): PayloadMap[F] => e.payload);
    }

    clear(): void {
        this.events.length = 0;
    }
}

export function createHarness(capacity = 64): { bus: EventBus<AppEvent>; sink: RecordingSink } {
    return { bus: new EventBus<AppEvent>(capacity), sink: new RecordingSink() };
}

export function user(event: UserEvent): AppEvent {
    return AppEvents.user(event);
}

/** Let every pending promise chain run */
export async function flush(): Promise<void> {
    for (let i = 0; i < 3; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

export async function waitFor(condition: () => boolean, timeoutMs = 1_000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
    }
}
