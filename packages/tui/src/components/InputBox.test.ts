import { describe, it, expect } from 'vitest';
import { initialViewState } from '../state/view-state.js';
import { paletteEvent } from './App.js';
import { PALETTE_ITEMS, parseSlashCommand } from './InputBox.js';
import { breadcrumb } from './StatusBar.js';

describe('parseSlashCommand', () => {
    it('matches typed commands', () => {
        expect(parseSlashCommand('/history')).toBe('history');
        expect(parseSlashCommand(' /MCP   add ')).toBe('add-mcp');
    });

    it('leaves everything else to be sent as a message', () => {
        expect(parseSlashCommand('hello')).toBeNull();
        expect(parseSlashCommand('/unknown')).toBeNull();
        expect(parseSlashCommand('/')).toBeNull();
    });

    it('offers a typed form for every entry but close', () => {
        expect(PALETTE_ITEMS.filter((item) => item.command === null).map((item) => item.value)).toEqual(['close']);
    });
});

describe('paletteEvent', () => {
    it('maps entries to user events', () => {
        const state = initialViewState();
        expect(paletteEvent('new', state)).toEqual({ type: 'new_conversation' });
        expect(paletteEvent('model', state)).toEqual({ type: 'open_model_selector' });
        expect(paletteEvent('add-mcp', state)).toEqual({ type: 'add_mcp' });
        expect(paletteEvent('history', state)).toBeNull();
    });

    it('only stops a reply that is streaming', () => {
        const idle = initialViewState();
        expect(paletteEvent('stop', idle)).toBeNull();

        const streaming = { ...idle, chat: { ...idle.chat, isStreaming: true } };
        expect(paletteEvent('stop', streaming)).toEqual({ type: 'stop_streaming' });
    });

    it('renames the active conversation only', () => {
        const idle = initialViewState();
        expect(paletteEvent('rename', idle)).toBeNull();

        const active = { ...idle, chat: { ...idle.chat, conversationId: 'c1' } };
        expect(paletteEvent('rename', active)).toEqual({ type: 'start_rename_conversation', id: 'c1' });
    });
});

describe('breadcrumb', () => {
    it('joins view titles', () => {
        expect(breadcrumb(['chat', 'settings', 'profile_editor'])).toBe('Chat › Settings › Profile');
    });
});
