/**
 * @perch/tui: Navigation State
 *
 * The view stack the router renders from. The bottom frame is the home
 * view and is never popped, so `current()` always has an answer.
 */

import { HOME_VIEW } from '@perch/shared';
import type { ViewId } from '@perch/shared';

export class NavigationState {
    private readonly views: ViewId[];

    constructor(private readonly root: ViewId = HOME_VIEW) {
        this.views = [root];
    }

    current(): ViewId {
        return this.views[this.views.length - 1] ?? this.root;
    }

    /** Push `to` unless it is already on top */
    navigate(to: ViewId): void {
        if (to === this.current()) return;
        this.views.push(to);
    }

    navigateBack(): boolean {
        if (!this.canGoBack()) return false;
        this.views.pop();
        return true;
    }

    canGoBack(): boolean {
        return this.views.length > 1;
    }

    stackDepth(): number {
        return this.views.length;
    }

    stack(): readonly ViewId[] {
        return [...this.views];
    }

    contains(view: ViewId): boolean {
        return this.views.includes(view);
    }

    /**
     * Pop back to the topmost frame showing `view`. Returns false, and
     * leaves the stack alone, when `view` is not on it.
     */
    popTo(view: ViewId): boolean {
        const index = this.views.lastIndexOf(view);
        if (index < 0) return false;
        this.views.length = index + 1;
        return true;
    }

    reset(): void {
        this.views.length = 1;
    }
}
