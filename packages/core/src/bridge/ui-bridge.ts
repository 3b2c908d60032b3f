/**
 * @perch/core: UI Bridge
 *
 * The two channels between the render loop and the core, plus the
 * notifier that wakes the loop. Everything the UI calls here returns
 * immediately.
 *
 *   UI ── emit ──▶ [user events] ──▶ forwarder ──▶ EventBus
 *   UI ◀─ drain ── [view commands] ◀── sink ◀──── presenters
 */

import { createLogger } from '@perch/shared';
import type { AppEvent, UserEvent, ViewCommand } from '@perch/shared';
import type { EventPublisher } from '../events/event-bus.js';
import { BoundedChannel } from './channel.js';
import { ViewCommandSink } from './view-command-sink.js';
import type { Notifier } from './view-command-sink.js';
import { startUserEventForwarder } from './user-event-forwarder.js';
import type { UserEventForwarder } from './user-event-forwarder.js';

const log = createLogger('UiBridge');

// ─── UI handle ────────────────────────────────────────────────────

export class UiBridge {
    private wakeListener: Notifier | null = null;

    constructor(
        private readonly userEvents: BoundedChannel<UserEvent>,
        private readonly commands: BoundedChannel<ViewCommand>,
    ) {}

    /** Queue a user action for the core; false when it had to be dropped */
    emit(event: UserEvent): boolean {
        const result = this.userEvents.trySend(event);
        if (result !== 'ok') {
            log.warn(`Dropped user:${event.type} (${result})`);
        }
        return result === 'ok';
    }

    /** Everything queued for the UI, oldest first */
    drainCommands(): ViewCommand[] {
        return this.commands.drain();
    }

    hasPendingCommands(): boolean {
        return !this.commands.isEmpty;
    }

    /** Register the render loop's wake-up; null to detach */
    setWakeListener(listener: Notifier | null): void {
        this.wakeListener = listener;
    }

    /** @internal Called by the sink after every send */
    notify(): void {
        this.wakeListener?.();
    }

    /** Closes the UI → core channel; the forwarder exits after draining it */
    disconnect(): void {
        this.userEvents.close();
    }
}

// ─── Wiring ───────────────────────────────────────────────────────

export interface BridgeOptions {
    readonly bus: EventPublisher<AppEvent>;
    readonly userEventCapacity: number;
    readonly viewCommandCapacity: number;
    /** Replaces the default notifier, which calls the UI's wake listener */
    readonly notifier?: Notifier;
}

export interface Bridge {
    readonly ui: UiBridge;
    readonly sink: ViewCommandSink;
    readonly forwarder: UserEventForwarder;
    /** Stop both directions and wait for the forwarder to finish */
    close(): Promise<void>;
}

export function createBridge(options: BridgeOptions): Bridge {
    const userEvents = new BoundedChannel<UserEvent>(options.userEventCapacity);
    const commands = new BoundedChannel<ViewCommand>(options.viewCommandCapacity);

    const ui = new UiBridge(userEvents, commands);
    const sink = new ViewCommandSink(commands, options.notifier ?? (() => ui.notify()));
    const forwarder = startUserEventForwarder(options.bus, userEvents);

    return {
        ui,
        sink,
        forwarder,
        async close() {
            ui.disconnect();
            await forwarder.done;
            commands.close();
        },
    };
}
