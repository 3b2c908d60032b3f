/**
 * @perch/core: User Event Forwarder
 *
 * Background task that moves UI events onto the bus as `user` events.
 * It ends when the UI side closes its channel.
 */

import { AppEvents, createLogger } from '@perch/shared';
import type { AppEvent, UserEvent } from '@perch/shared';
import type { EventPublisher } from '../events/event-bus.js';
import type { BoundedChannel } from './channel.js';

const log = createLogger('Forwarder');

export interface UserEventForwarder {
    /** Resolves once the input channel is closed and drained */
    readonly done: Promise<void>;
}

export function startUserEventForwarder(bus: EventPublisher<AppEvent>, input: BoundedChannel<UserEvent>): UserEventForwarder {
    const done = (async () => {
        for (;;) {
            const event = await input.recv();
            if (event === undefined) break;

            const result = bus.publish(AppEvents.user(event));
            if (!result.ok) {
                log.debug(`user:${event.type} not delivered (${result.reason})`);
            }
        }
        log.debug('Input closed, forwarder stopped');
    })();

    return { done };
}
