import { describe, it, expect } from 'vitest';
import { initialViewState } from '../state/view-state.js';
import type { ViewState } from '../state/view-state.js';
import { confirmEvent, describeTarget } from './ConfirmModal.js';

function stateWithHistory(): ViewState {
    const state = initialViewState();
    return {
        ...state,
        history: {
            summaries: [{ id: 'c1', title: 'Trip plans', messageCount: 4, updatedAt: '2026-01-02T10:00:00.000Z', isActive: false }],
            count: 1,
        },
    };
}

describe('ConfirmModal helpers', () => {
    it('confirms the dialog that is open', () => {
        expect(confirmEvent('confirm_delete_conversation', 'c1')).toEqual({ type: 'confirm_delete_conversation', id: 'c1' });
        expect(confirmEvent('confirm_delete_profile', 'p1')).toEqual({ type: 'confirm_delete_profile', id: 'p1' });
        expect(confirmEvent('confirm_delete_mcp', 'm1')).toEqual({ type: 'confirm_delete_mcp', id: 'm1' });
    });

    it('names a known target', () => {
        expect(describeTarget(stateWithHistory(), 'confirm_delete_conversation', 'c1')).toBe('Delete conversation "Trip plans"?');
    });

    it('falls back to the id', () => {
        expect(describeTarget(initialViewState(), 'confirm_delete_profile', 'p9')).toBe(
            'Delete profile "p9"? Its stored API key is removed too.',
        );
        expect(describeTarget(initialViewState(), 'confirm_delete_mcp', 'm9')).toBe('Remove MCP server "m9"?');
    });
});
