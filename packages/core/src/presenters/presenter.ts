/**
 * @perch/core: Presenter base
 *
 * A presenter owns one subscription and one background loop while it
 * runs. The loop hands each event to `dispatch` in publish order; a
 * `lagged` notice is logged and the loop carries on, a `closed` bus ends
 * it. `stop()` only lowers the flag: the loop notices on its next
 * receive and exits without dispatching the event it received.
 * `system:app_will_terminate` also ends the loop once handled.
 *
 * Service failures never leave a presenter. `attempt` turns a rejected
 * service call into exactly one `show_error` command.
 */

import { AppEvents, createLogger, describeError, describeEvent } from '@perch/shared';
import type { AppEvent, ErrorSeverity, Logger, ModalId, NavigationEvent, ViewCommand, ViewId } from '@perch/shared';
import type { EventBus, Subscription } from '../events/event-bus.js';
import type { CommandSink } from '../bridge/view-command-sink.js';

// ─── Types ────────────────────────────────────────────────────────

export interface PresenterContext {
    readonly bus: EventBus<AppEvent>;
    readonly sink: CommandSink;
}

export type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: unknown };

interface Run {
    readonly id: number;
    readonly subscription: Subscription<AppEvent>;
    readonly done: Promise<void>;
}

function isShutdown(event: AppEvent): boolean {
    return event.type === 'system' && event.payload.type === 'app_will_terminate';
}

// ─── Presenter ────────────────────────────────────────────────────

export abstract class Presenter {
    protected readonly log: Logger;
    protected readonly bus: EventBus<AppEvent>;
    private readonly sink: CommandSink;

    private running = false;
    private current: Run | null = null;
    private runs = 0;

    protected constructor(
        readonly name: string,
        context: PresenterContext,
    ) {
        this.log = createLogger(name);
        this.bus = context.bus;
        this.sink = context.sink;
    }

    /** React to one event; unmatched events are ignored */
    protected abstract dispatch(event: AppEvent): Promise<void>;

    // ── Lifecycle ─────────────────────────────────────────────────

    start(): void {
        if (this.running) return;
        this.running = true;

        // A loop left over from stop() must not keep consuming
        this.current?.subscription.unsubscribe();

        const id = ++this.runs;
        const subscription = this.bus.subscribe();
        const done = this.loop(id, subscription);
        this.current = { id, subscription, done };
    }

    stop(): void {
        this.running = false;
    }

    isRunning(): boolean {
        return this.running;
    }

    /** Resolves when the most recent loop has exited */
    async join(): Promise<void> {
        await this.current?.done;
    }

    private async loop(id: number, subscription: Subscription<AppEvent>): Promise<void> {
        this.log.debug('Subscribed');
        try {
            for (;;) {
                const result = await subscription.recv();
                if (!this.running || this.current?.id !== id) break;

                if (result.status === 'closed') break;
                if (result.status === 'lagged') {
                    this.log.warn(`Lagged behind the bus, skipped ${result.skipped} event(s)`);
                    continue;
                }

                await this.handle(result.event);
                if (isShutdown(result.event)) break;
            }
        } finally {
            subscription.unsubscribe();
            if (this.current?.id === id) this.running = false;
            this.log.debug('Loop exited');
        }
    }

    private async handle(event: AppEvent): Promise<void> {
        try {
            await this.dispatch(event);
        } catch (err) {
            this.log.error(`Unhandled error in ${describeEvent(event)}`, err);
            this.showError('Unexpected Error', describeError(err), 'critical');
        }
    }

    // ── Helpers for subclasses ────────────────────────────────────

    protected emit(command: ViewCommand): void {
        this.sink.send(command);
    }

    protected showError(title: string, message: string, severity: ErrorSeverity = 'error'): void {
        this.emit({ type: 'show_error', title, message, severity });
    }

    /** Run a service call; on rejection emit one show_error and report failure */
    protected async attempt<T>(title: string, operation: () => Promise<T>, severity: ErrorSeverity = 'error'): Promise<Outcome<T>> {
        try {
            return { ok: true, value: await operation() };
        } catch (err) {
            const message = describeError(err);
            this.log.warn(`${title}: ${message}`);
            this.showError(title, message, severity);
            return { ok: false, error: err };
        }
    }

    /** Put a follow-up event on the bus for other presenters */
    protected publish(event: AppEvent): void {
        const result = this.bus.publish(event);
        if (!result.ok) this.log.debug(`${describeEvent(event)} not delivered (${result.reason})`);
    }

    protected navigateTo(view: ViewId): void {
        this.emit({ type: 'navigate_to', view });
        this.publishNavigation({ type: 'navigating', to: view });
    }

    protected navigateBack(): void {
        this.emit({ type: 'navigate_back' });
        this.publishNavigation({ type: 'back_requested' });
    }

    protected showModal(modal: ModalId, targetId: string): void {
        this.emit({ type: 'show_modal', modal, targetId });
        this.publishNavigation({ type: 'modal_presented', modal, targetId });
    }

    protected dismissModal(modal: ModalId | null): void {
        this.emit({ type: 'dismiss_modal' });
        this.publishNavigation({ type: 'modal_dismissed', modal });
    }

    private publishNavigation(event: NavigationEvent): void {
        this.publish(AppEvents.navigation(event));
    }
}
