import { describe, it, expect } from 'vitest';
import { initialViewState } from '../../state/view-state.js';
import type { ViewState } from '../../state/view-state.js';
import { nextTheme, settingsRows } from './SettingsView.js';
import { cycleSource } from './McpAddView.js';
import { cycleProvider } from './ModelSelectorView.js';

describe('settingsRows', () => {
    it('always offers the actions and preferences', () => {
        expect(settingsRows(initialViewState()).map((row) => row.label)).toEqual([
            '+ New profile',
            '+ Add MCP server',
            'Hotkey: ',
            'Theme: dark',
        ]);
    });

    it('shows profile tests and MCP failures', () => {
        const base = initialViewState();
        const state: ViewState = {
            ...base,
            settings: {
                ...base.settings,
                profiles: [{ id: 'p1', name: 'Work', providerId: 'anthropic', modelId: 'claude', isDefault: true }],
                mcpServers: [{ id: 'm1', name: 'Files', enabled: false, status: 'stopped', toolCount: 0 }],
            },
            profileTests: { p1: { status: 'passed', responseTimeMs: 42 } },
            mcp: { ...base.mcp, failures: { m1: 'boom' } },
        };

        const rows = settingsRows(state);
        expect(rows[0]).toEqual({ key: 'profile:p1', label: '★ Work  anthropic/claude  ✅ 42ms', value: { kind: 'profile', id: 'p1' } });
        expect(rows[2]).toEqual({
            key: 'mcp:m1',
            label: '☐ Files  stopped, 0 tools  ⚠ boom',
            value: { kind: 'mcp', id: 'm1', enabled: false },
        });
    });
});

describe('filter cycling', () => {
    it('cycles themes', () => {
        expect(nextTheme('dark')).toBe('light');
        expect(nextTheme('system')).toBe('dark');
    });

    it('cycles registry sources both ways', () => {
        expect(cycleSource('all', 1)).toBe('official');
        expect(cycleSource('all', -1)).toBe('community');
    });

    it('cycles providers through "all"', () => {
        const providers = [
            { id: 'openai', name: 'OpenAI' },
            { id: 'anthropic', name: 'Anthropic' },
        ];
        expect(cycleProvider(providers, null, 1)).toBe('openai');
        expect(cycleProvider(providers, 'anthropic', 1)).toBeNull();
        expect(cycleProvider(providers, null, -1)).toBe('anthropic');
    });
});
