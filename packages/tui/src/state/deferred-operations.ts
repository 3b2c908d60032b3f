/**
 * @perch/tui: Deferred Operations
 *
 * A key handler that wants to open or close the overlay panel must not
 * do it while ink is still delivering that keystroke. It requests the
 * change here instead, and the frame loop applies it on the next tick.
 */

// ─── Queue ────────────────────────────────────────────────────────

/** One pending slot; a new request replaces an unapplied one */
export class DeferredOperationQueue<Op> {
    private slot: { readonly op: Op } | null = null;

    request(op: Op): void {
        this.slot = { op };
    }

    hasPending(): boolean {
        return this.slot !== null;
    }

    /** The operation that will run next, if any */
    peek(): Op | undefined {
        return this.slot?.op;
    }

    /** Take the pending operation and run it once; false when there was none */
    drainAndApply(apply: (op: Op) => void): boolean {
        const slot = this.slot;
        if (!slot) return false;
        this.slot = null;
        apply(slot.op);
        return true;
    }
}

// ─── Overlay panel ────────────────────────────────────────────────

export type PopoverAnchor = 'status_bar' | 'input';

export type PopoverOperation = { readonly type: 'show'; readonly anchor: PopoverAnchor } | { readonly type: 'hide' };

export class PopoverController {
    private readonly queue = new DeferredOperationQueue<PopoverOperation>();
    private shownAt: PopoverAnchor | null = null;

    constructor(private readonly onChange: (anchor: PopoverAnchor | null) => void = () => {}) {}

    show(anchor: PopoverAnchor): void {
        this.queue.request({ type: 'show', anchor });
    }

    hide(): void {
        this.queue.request({ type: 'hide' });
    }

    /** Flip against what the panel will look like once pending work lands */
    toggle(anchor: PopoverAnchor): void {
        if (this.willBeVisible()) this.hide();
        else this.show(anchor);
    }

    isVisible(): boolean {
        return this.shownAt !== null;
    }

    anchor(): PopoverAnchor | null {
        return this.shownAt;
    }

    /** Frame-loop hook; never call from inside a key handler */
    applyPending(): boolean {
        return this.queue.drainAndApply((op) => {
            const next = op.type === 'show' ? op.anchor : null;
            if (next === this.shownAt) return;
            this.shownAt = next;
            this.onChange(next);
        });
    }

    private willBeVisible(): boolean {
        const pending = this.queue.peek();
        return pending ? pending.type === 'show' : this.isVisible();
    }
}
