/**
 * ConfirmModal: Y/N gate for destructive actions
 *
 * While a delete confirmation is open this component owns the keyboard:
 * Y sends the matching confirm event, N or Esc cancels. The views
 * underneath stop taking input until it closes.
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import type { ModalId, UserEvent } from '@perch/shared';
import type { ViewState } from '../state/view-state.js';

// ─── Props ────────────────────────────────────────────────────────

export interface ConfirmModalProps {
    readonly state: ViewState;
    readonly onConfirm: (event: UserEvent) => void;
    readonly onCancel: () => void;
}

// ─── Helpers ──────────────────────────────────────────────────────

export function confirmEvent(modal: ModalId, id: string): UserEvent {
    switch (modal) {
        case 'confirm_delete_conversation':
            return { type: 'confirm_delete_conversation', id };
        case 'confirm_delete_profile':
            return { type: 'confirm_delete_profile', id };
        case 'confirm_delete_mcp':
            return { type: 'confirm_delete_mcp', id };
    }
}

/** What the dialog asks, naming the target when the view state knows it */
export function describeTarget(state: ViewState, modal: ModalId, id: string): string {
    switch (modal) {
        case 'confirm_delete_conversation': {
            const title = state.history.summaries.find((c) => c.id === id)?.title;
            return `Delete conversation "${title ?? id}"?`;
        }
        case 'confirm_delete_profile': {
            const name = state.settings.profiles.find((p) => p.id === id)?.name;
            return `Delete profile "${name ?? id}"? Its stored API key is removed too.`;
        }
        case 'confirm_delete_mcp': {
            const name = state.settings.mcpServers.find((s) => s.id === id)?.name;
            return `Remove MCP server "${name ?? id}"?`;
        }
    }
}

// ─── Component ────────────────────────────────────────────────────

export function ConfirmModal({ state, onConfirm, onCancel }: ConfirmModalProps): React.ReactElement | null {
    const open = state.modal;

    useInput((input, key) => {
        if (!open) return;

        const lower = input.toLowerCase();
        if (lower === 'y') {
            onConfirm(confirmEvent(open.modal, open.targetId));
        } else if (lower === 'n' || key.escape) {
            onCancel();
        }
    }, { isActive: open !== null });

    if (!open) return null;

    return (
        <Box flexDirection="column" borderStyle="double" borderColor="red" paddingX={2} paddingY={1} marginY={1}>
            <Text bold color="red">⚠️  CONFIRM</Text>
            <Text> </Text>
            <Text>{describeTarget(state, open.modal, open.targetId)}</Text>
            <Text> </Text>
            <Text bold>
                <Text color="green">[Y]</Text>
                <Text> Delete  </Text>
                <Text color="red">[N]</Text>
                <Text> Keep  </Text>
                <Text color="gray">[Esc]</Text>
                <Text color="gray"> Keep</Text>
            </Text>
        </Box>
    );
}
