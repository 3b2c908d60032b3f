/**
 * @perch/core: View Command Sink
 *
 * The presenters' side of the core → UI channel. `send` never blocks and
 * always rings the UI notifier afterwards, including when the command
 * was dropped, so the render loop wakes and drains what it can.
 */

import { createLogger } from '@perch/shared';
import type { ViewCommand } from '@perch/shared';
import type { BoundedChannel } from './channel.js';

const log = createLogger('ViewCommandSink');

/** Wakes the UI render loop; must not block */
export type Notifier = () => void;

/** What presenters write to */
export interface CommandSink {
    send(command: ViewCommand): boolean;
}

export class ViewCommandSink implements CommandSink {
    private dropped = 0;

    constructor(
        private readonly channel: BoundedChannel<ViewCommand>,
        private readonly notifier: Notifier,
    ) {}

    send(command: ViewCommand): boolean {
        const result = this.channel.trySend(command);

        if (result === 'full') {
            this.dropped++;
            log.warn(`Command channel full (${this.channel.capacity}), dropped ${command.type}`);
        } else if (result === 'closed') {
            log.debug(`UI gone, dropped ${command.type}`);
        }

        try {
            this.notifier();
        } catch (err) {
            log.error('Notifier threw', err);
        }
        return result === 'ok';
    }

    /** Commands lost to a full channel since creation */
    get droppedCount(): number {
        return this.dropped;
    }
}
