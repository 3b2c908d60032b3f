/**
 * SettingsView: profiles, MCP servers and preferences in one list
 *
 * Enter acts on the highlighted row (make default, toggle, edit a
 * preference); the letter keys shown in the footer act on it too.
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import SelectInput from 'ink-select-input';
import TextInput from 'ink-text-input';
import type { Theme, UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';

const THEMES: readonly Theme[] = ['dark', 'light', 'system'];

export type SettingsRow =
    | { readonly kind: 'profile'; readonly id: string }
    | { readonly kind: 'mcp'; readonly id: string; readonly enabled: boolean }
    | { readonly kind: 'new_profile' }
    | { readonly kind: 'add_mcp' }
    | { readonly kind: 'hotkey' }
    | { readonly kind: 'theme' };

// ─── Helpers ──────────────────────────────────────────────────────

export function nextTheme(theme: Theme): Theme {
    return THEMES[(THEMES.indexOf(theme) + 1) % THEMES.length] ?? 'dark';
}

function testBadge(state: ViewState, id: string): string {
    const test = state.profileTests[id];
    if (!test) return '';
    if (test.status === 'running') return '  ⏳ testing';
    if (test.status === 'passed') return `  ✅ ${test.responseTimeMs ?? 0}ms`;
    return `  ❌ ${test.error ?? 'failed'}`;
}

export function settingsRows(state: ViewState): Array<{ key: string; label: string; value: SettingsRow }> {
    const { settings } = state;
    return [
        ...settings.profiles.map((p) => ({
            key: `profile:${p.id}`,
            label: `${p.isDefault ? '★' : ' '} ${p.name}  ${p.providerId}/${p.modelId}${testBadge(state, p.id)}`,
            value: { kind: 'profile', id: p.id } satisfies SettingsRow,
        })),
        { key: 'new_profile', label: '+ New profile', value: { kind: 'new_profile' } },
        ...settings.mcpServers.map((s) => ({
            key: `mcp:${s.id}`,
            label: `${s.enabled ? '☑' : '☐'} ${s.name}  ${s.status}, ${s.toolCount} tools${state.mcp.failures[s.id] ? `  ⚠ ${state.mcp.failures[s.id]}` : ''}`,
            value: { kind: 'mcp', id: s.id, enabled: s.enabled } satisfies SettingsRow,
        })),
        { key: 'add_mcp', label: '+ Add MCP server', value: { kind: 'add_mcp' } },
        { key: 'hotkey', label: `Hotkey: ${settings.hotkey}`, value: { kind: 'hotkey' } },
        { key: 'theme', label: `Theme: ${settings.theme}`, value: { kind: 'theme' } },
    ];
}

// ─── Props ────────────────────────────────────────────────────────

export interface SettingsViewProps {
    readonly state: ViewState;
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function SettingsView({ state, active, send }: SettingsViewProps): React.ReactElement {
    const rows = settingsRows(state);
    const [highlighted, setHighlighted] = useState<SettingsRow | null>(null);
    const [hotkeyDraft, setHotkeyDraft] = useState<string | null>(null);
    const current = highlighted ?? rows[0]?.value ?? null;
    const editingHotkey = hotkeyDraft !== null;

    const onSelect = (row: SettingsRow): void => {
        switch (row.kind) {
            case 'profile':
                send({ type: 'select_profile', id: row.id });
                return;
            case 'mcp':
                send({ type: 'toggle_mcp', id: row.id, enabled: !row.enabled });
                return;
            case 'new_profile':
                send({ type: 'create_profile' });
                return;
            case 'add_mcp':
                send({ type: 'add_mcp' });
                return;
            case 'hotkey':
                setHotkeyDraft(state.settings.hotkey);
                return;
            case 'theme':
                send({ type: 'set_theme', theme: nextTheme(state.settings.theme) });
                return;
        }
    };

    useInput((input) => {
        if (editingHotkey || !current) return;

        const lower = input.toLowerCase();
        if (current.kind === 'profile') {
            if (lower === 'e') send({ type: 'edit_profile', id: current.id });
            if (lower === 't') send({ type: 'test_profile_connection', id: current.id });
            if (lower === 'd') send({ type: 'delete_profile', id: current.id });
        }
        if (current.kind === 'mcp') {
            if (lower === 'c') send({ type: 'configure_mcp', id: current.id });
            if (lower === 'd') send({ type: 'delete_mcp', id: current.id });
        }
    }, { isActive: active });

    if (!state.settings.loaded) {
        return (
            <Box borderStyle="round" borderColor="cyan" paddingX={1}>
                <Text color="yellow">⏳ Loading settings...</Text>
            </Box>
        );
    }

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} minHeight={10}>
            <Text bold color="cyan" underline>Settings</Text>
            <SelectInput
                items={rows}
                isFocused={active && !editingHotkey}
                onHighlight={(item) => setHighlighted(item.value)}
                onSelect={(item) => onSelect(item.value)}
            />
            {hotkeyDraft !== null && (
                <Box gap={1}>
                    <Text color="cyan">New hotkey:</Text>
                    <TextInput
                        value={hotkeyDraft}
                        onChange={setHotkeyDraft}
                        focus={active}
                        onSubmit={(hotkey) => {
                            send({ type: 'set_hotkey', hotkey });
                            setHotkeyDraft(null);
                        }}
                    />
                </Box>
            )}
            <Text color="gray" dimColor>
                Enter: default/toggle  •  E: edit  •  T: test  •  C: configure  •  D: delete  •  Esc: back
            </Text>
        </Box>
    );
}
