/**
 * @perch/core: History Presenter
 *
 * Keeps the conversation list current and handles opening and deleting
 * past conversations.
 */

import { AppEvents, DEFAULT_CONVERSATION_PAGE_SIZE } from '@perch/shared';
import type { AppEvent } from '@perch/shared';
import type { ConversationService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export class HistoryPresenter extends Presenter {
    constructor(
        context: PresenterContext,
        private readonly conversations: ConversationService,
    ) {
        super('HistoryPresenter', context);
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type === 'user') {
            const user = event.payload;
            switch (user.type) {
                case 'navigate':
                    if (user.to === 'history') await this.refresh();
                    return;

                case 'select_conversation': {
                    const opened = await this.attempt('Could Not Open Conversation', async () => {
                        await this.conversations.setActive(user.id);
                        return this.conversations.load(user.id);
                    });
                    if (opened.ok) {
                        this.emit({ type: 'conversation_activated', id: opened.value.id, title: opened.value.title });
                        this.navigateTo('chat');
                    }
                    return;
                }

                case 'delete_conversation':
                    this.showModal('confirm_delete_conversation', user.id);
                    return;

                case 'confirm_delete_conversation': {
                    const deleted = await this.attempt('Delete Failed', () => this.conversations.delete(user.id));
                    if (deleted.ok) this.dismissModal('confirm_delete_conversation');
                    return;
                }

                default:
                    return;
            }
        }

        if (event.type === 'navigation' && event.payload.type === 'navigating' && event.payload.to === 'history') {
            await this.refresh();
            return;
        }

        if (event.type === 'conversation') {
            const change = event.payload;
            switch (change.type) {
                case 'created':
                case 'activated':
                    await this.refresh();
                    return;
                case 'deleted':
                    this.emit({ type: 'conversation_deleted', id: change.id });
                    await this.refresh();
                    return;
                case 'title_updated':
                    this.emit({ type: 'conversation_title_updated', id: change.id, title: change.title });
                    return;
                default:
                    return;
            }
        }
    }

    private async refresh(): Promise<void> {
        const listed = await this.attempt('History Unavailable', () => this.conversations.list(DEFAULT_CONVERSATION_PAGE_SIZE));
        if (!listed.ok) return;

        this.emit({ type: 'conversation_list_refreshed', summaries: listed.value });
        this.emit({ type: 'history_updated', count: listed.value.length });
        this.publish(AppEvents.conversation({ type: 'list_refreshed', count: listed.value.length }));
    }
}
