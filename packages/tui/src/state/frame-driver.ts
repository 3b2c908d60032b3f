/**
 * @perch/tui: Frame Driver
 *
 * One `tick()` per render frame: drain whatever the presenters queued,
 * fold it into the view state, move the navigation stack, then apply the
 * deferred overlay change. Nothing here blocks and nothing here runs
 * from inside a key handler.
 */

import { createLogger } from '@perch/shared';
import type { ProfileDraft, UserEvent, ViewCommand, ViewId } from '@perch/shared';
import { NavigationState } from './navigation.js';
import { PopoverController } from './deferred-operations.js';
import { applyViewCommand, closeProfileEditor, initialViewState, keepProfileDraft } from './view-state.js';
import type { ViewState } from './view-state.js';

const log = createLogger('Frame');

/** The UI half of the bridge */
export interface CommandPort {
    emit(event: UserEvent): boolean;
    drainCommands(): ViewCommand[];
    hasPendingCommands(): boolean;
}

export class FrameDriver {
    readonly navigation: NavigationState;
    readonly popover: PopoverController;
    private viewState: ViewState = initialViewState();
    private woken = false;
    /** Set by local changes made between frames */
    private dirty = false;

    constructor(
        private readonly port: CommandPort,
        navigation = new NavigationState(),
        popover = new PopoverController(),
    ) {
        this.navigation = navigation;
        this.popover = popover;
    }

    get state(): ViewState {
        return this.viewState;
    }

    view(): ViewId {
        return this.navigation.current();
    }

    /** Notifier target; the next tick drains even if the peek saw nothing */
    wake(): void {
        this.woken = true;
    }

    /** Run one frame; true when anything on screen changed */
    tick(): boolean {
        let changed = this.dirty;
        this.dirty = false;

        if (this.woken || this.port.hasPendingCommands()) {
            this.woken = false;
            const commands = this.port.drainCommands();
            for (const command of commands) this.apply(command);
            if (commands.length > 0) changed = true;
        }

        if (this.popover.applyPending()) changed = true;
        return changed;
    }

    // ── User actions ──────────────────────────────────────────────

    /** Forward a user action; false when the bridge had to drop it */
    send(event: UserEvent): boolean {
        return this.port.emit(event);
    }

    /** Push a view and tell the presenters so they can load it */
    open(view: ViewId): void {
        if (view === this.navigation.current()) return;
        this.navigation.navigate(view);
        this.dirty = true;
        this.send({ type: 'navigate', to: view });
    }

    back(): boolean {
        if (!this.navigation.navigateBack()) return false;
        this.dropClosedEditor();
        this.dirty = true;
        this.send({ type: 'navigate_back' });
        return true;
    }

    /** Cancel the open dialog; confirming goes through the presenters instead */
    dismissModal(): boolean {
        if (!this.viewState.modal) return false;
        this.viewState = applyViewCommand(this.viewState, { type: 'dismiss_modal' });
        this.dirty = true;
        this.send({ type: 'dismiss_modal' });
        return true;
    }

    /** Open the model selector for the profile being edited; the selection lands in `draft` */
    pickModel(draft: ProfileDraft): boolean {
        if (!this.viewState.profileEditor) return false;
        this.viewState = keepProfileDraft(this.viewState, draft);
        this.dirty = true;
        return this.send({ type: 'open_model_selector' });
    }

    // ── Private ───────────────────────────────────────────────────

    private apply(command: ViewCommand): void {
        switch (command.type) {
            case 'navigate_to':
                // A view already on the stack is returned to rather than stacked twice
                if (!this.navigation.popTo(command.view)) this.navigation.navigate(command.view);
                this.dropClosedEditor();
                break;
            case 'navigate_back':
                if (!this.navigation.navigateBack()) log.debug('navigate_back at the home view');
                this.dropClosedEditor();
                break;
            default:
                this.viewState = applyViewCommand(this.viewState, command);
        }
    }

    /** A profile editor popped off the stack is abandoned, unsaved draft included */
    private dropClosedEditor(): void {
        if (!this.navigation.contains('profile_editor')) this.viewState = closeProfileEditor(this.viewState);
    }
}
