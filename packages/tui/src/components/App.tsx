/**
 * @perch/tui: App (root component)
 *
 * Layout shell around the current view:
 *   StatusBar        view path, streaming state, model, MCP count
 *   ErrorBanner      the error on screen, Esc dismisses
 *   view             chat (ChatLog + InputBox) or one of the panels
 *   ConfirmModal     Y/N gate for deletes
 *   QuickPanel       overlay toggled with Tab, applied on the next frame
 *   NotificationLog  recent notifications
 *
 * The component owns no application state. It renders what the
 * FrameDriver folded from the presenters' commands and turns keys into
 * user events.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { APP_NAME, APP_VERSION } from '@perch/shared';
import type { UserEvent, ViewId } from '@perch/shared';
import type { FrameDriver } from '../state/frame-driver.js';
import { useFrameLoop } from '../hooks/use-frame-loop.js';
import type { WakeSource } from '../hooks/use-frame-loop.js';
import type { ViewState } from '../state/view-state.js';
import { StatusBar } from './StatusBar.js';
import { ChatLog } from './ChatLog.js';
import { ErrorBanner } from './ErrorBanner.js';
import { ConfirmModal } from './ConfirmModal.js';
import { QuickPanel } from './QuickPanel.js';
import { NotificationLog } from './NotificationLog.js';
import { InputBox, parseSlashCommand } from './InputBox.js';
import type { PaletteAction } from './InputBox.js';
import { HistoryView } from './views/HistoryView.js';
import { SettingsView } from './views/SettingsView.js';
import { ProfileEditorView } from './views/ProfileEditorView.js';
import { McpAddView } from './views/McpAddView.js';
import { McpConfigureView } from './views/McpConfigureView.js';
import { ModelSelectorView } from './views/ModelSelectorView.js';

// ─── Props ────────────────────────────────────────────────────────

export interface AppProps {
    readonly driver: FrameDriver;
    readonly wakeSource: WakeSource;
    readonly frameIntervalMs: number;
}

// ─── Helpers ──────────────────────────────────────────────────────

/** The user event behind a palette entry; null for entries handled locally */
export function paletteEvent(action: PaletteAction, state: ViewState): UserEvent | null {
    switch (action) {
        case 'new':
            return { type: 'new_conversation' };
        case 'model':
            return { type: 'open_model_selector' };
        case 'add-mcp':
            return { type: 'add_mcp' };
        case 'thinking':
            return { type: 'toggle_thinking' };
        case 'stop':
            return state.chat.isStreaming ? { type: 'stop_streaming' } : null;
        case 'rename':
            return state.chat.conversationId ? { type: 'start_rename_conversation', id: state.chat.conversationId } : null;
        case 'history':
        case 'settings':
        case 'close':
            return null;
    }
}

function RenamePrompt({ rename, send }: { rename: NonNullable<ViewState['chat']['rename']>; send: (event: UserEvent) => void }): React.ReactElement {
    const [title, setTitle] = useState(rename.title);

    useEffect(() => setTitle(rename.title), [rename]);

    return (
        <Box borderStyle="single" borderColor="cyan" paddingX={1} gap={1}>
            <Text color="cyan">✏️  Rename to:</Text>
            <TextInput
                value={title}
                onChange={setTitle}
                onSubmit={(text) => send({ type: 'confirm_rename_conversation', id: rename.id, title: text })}
            />
        </Box>
    );
}

// ─── Component ────────────────────────────────────────────────────

export function App({ driver, wakeSource, frameIntervalMs }: AppProps): React.ReactElement {
    useFrameLoop(driver, wakeSource, frameIntervalMs);

    const [input, setInput] = useState('');
    const [paletteOpen, setPaletteOpen] = useState(false);

    const state = driver.state;
    const view = driver.view();
    const rename = state.chat.rename;
    const dialogOpen = state.modal !== null;
    const viewActive = !dialogOpen && rename === null && !paletteOpen;

    const send = (event: UserEvent): void => {
        driver.send(event);
    };

    const goTo = (target: ViewId): void => driver.open(target);

    const runPalette = (action: PaletteAction): void => {
        setPaletteOpen(false);
        if (action === 'history' || action === 'settings') {
            goTo(action);
            return;
        }
        const event = paletteEvent(action, state);
        if (event) send(event);
    };

    // ── Global keys ───────────────────────────────────────────

    useInput((_input, key) => {
        if (key.tab) {
            driver.popover.toggle(view === 'chat' ? 'input' : 'status_bar');
            return;
        }
        if (!key.escape) return;

        if (paletteOpen) setPaletteOpen(false);
        else if (rename) send({ type: 'cancel_rename_conversation' });
        else if (state.error) send({ type: 'dismiss_error' });
        else if (driver.popover.isVisible()) driver.popover.hide();
        else driver.back();
    }, { isActive: !dialogOpen });

    // ── Chat input ────────────────────────────────────────────

    const onInputChange = (value: string): void => {
        if (value === '/' && input === '') {
            setPaletteOpen(true);
            return;
        }
        setInput(value);
    };

    const onInputSubmit = (value: string): void => {
        setInput('');
        const action = parseSlashCommand(value);
        if (action) runPalette(action);
        else if (value.trim()) send({ type: 'send_message', text: value });
    };

    // ── Render ────────────────────────────────────────────────

    const renderView = (): React.ReactElement => {
        switch (view) {
            case 'chat':
                return (
                    <>
                        <ChatLog chat={state.chat} />
                        <InputBox
                            value={input}
                            isStreaming={state.chat.isStreaming}
                            isPaletteOpen={paletteOpen}
                            locked={dialogOpen || rename !== null}
                            onChange={onInputChange}
                            onSubmit={onInputSubmit}
                            onPaletteSelect={runPalette}
                        />
                    </>
                );
            case 'history':
                return <HistoryView history={state.history} active={viewActive} send={send} />;
            case 'settings':
                return <SettingsView state={state} active={viewActive} send={send} />;
            case 'profile_editor':
                return (
                    <ProfileEditorView
                        editor={state.profileEditor}
                        active={viewActive}
                        send={send}
                        onPickModel={(draft) => driver.pickModel(draft)}
                    />
                );
            case 'mcp_add':
                return <McpAddView registry={state.mcp.registry} active={viewActive} send={send} />;
            case 'mcp_configure':
                return <McpConfigureView mcp={state.mcp} active={viewActive} send={send} />;
            case 'model_selector':
                return <ModelSelectorView models={state.models} active={viewActive} send={send} />;
        }
    };

    return (
        <Box flexDirection="column" padding={1}>
            <Box borderStyle="double" borderColor="cyan" paddingX={2}>
                <Text bold color="cyan">🪶 {APP_NAME}</Text>
                <Text color="gray"> v{APP_VERSION}</Text>
            </Box>

            <StatusBar state={state} stack={driver.navigation.stack()} />
            <QuickPanel anchor={driver.popover.anchor()} state={state} />
            <ErrorBanner error={state.error} />

            {renderView()}

            {rename && <RenamePrompt rename={rename} send={send} />}
            <ConfirmModal state={state} onConfirm={send} onCancel={() => driver.dismissModal()} />
            <NotificationLog notifications={state.notifications} />

            <Box marginTop={1}>
                <Text color="gray" italic dimColor>
                    {dialogOpen ? 'Y: confirm  •  N: keep' : 'Enter: send  •  /: menu  •  Tab: quick view  •  Esc: back  •  Ctrl+C: exit'}
                </Text>
            </Box>
        </Box>
    );
}
