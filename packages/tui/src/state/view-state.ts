/**
 * @perch/tui: View State
 *
 * Everything the screens render, and the pure reducer that folds one
 * ViewCommand into it. Navigation commands pass through untouched; the
 * frame driver applies those to the NavigationState.
 */

import type {
    ConversationSummary,
    ErrorSeverity,
    McpRegistryEntry,
    McpServerConfig,
    McpServerSummary,
    McpTool,
    MessageRole,
    ModalId,
    ModelInfo,
    NotificationLevel,
    ProfileDraft,
    ProfileSummary,
    ProviderInfo,
    Theme,
    ToolCallStatus,
    ViewCommand,
} from '@perch/shared';

export const MAX_NOTIFICATIONS = 15;

// ─── Types ────────────────────────────────────────────────────────

export interface ModelChoice {
    readonly providerId: string;
    readonly modelId: string;
    readonly baseUrl?: string;
}

export interface TranscriptEntry {
    readonly role: MessageRole;
    readonly content: string;
    readonly thinking?: string;
    /** Set on replies that did not finish */
    readonly outcome?: 'cancelled' | 'error';
}

export interface ToolCallView {
    readonly id: string;
    readonly name: string;
    readonly status: ToolCallStatus;
    readonly result?: string;
    readonly durationMs?: number;
}

export interface ChatState {
    readonly conversationId: string | null;
    readonly title: string | null;
    readonly transcript: readonly TranscriptEntry[];
    readonly streamingText: string;
    readonly thinkingText: string;
    readonly isStreaming: boolean;
    readonly isThinking: boolean;
    readonly showThinking: boolean;
    readonly toolCalls: readonly ToolCallView[];
    readonly lastTokens: number | null;
    readonly rename: { readonly id: string; readonly title: string } | null;
}

export interface ProfileTestView {
    readonly status: 'running' | 'passed' | 'failed';
    readonly responseTimeMs?: number;
    readonly error?: string;
}

export interface ViewState {
    readonly chat: ChatState;
    readonly history: { readonly summaries: readonly ConversationSummary[]; readonly count: number };
    readonly settings: {
        readonly loaded: boolean;
        readonly profiles: readonly ProfileSummary[];
        readonly mcpServers: readonly McpServerSummary[];
        readonly hotkey: string;
        readonly theme: Theme;
    };
    readonly profileTests: Readonly<Record<string, ProfileTestView>>;
    readonly profileEditor: {
        readonly mode: 'create' | 'edit';
        readonly draft: ProfileDraft;
        readonly errors: readonly string[];
    } | null;
    readonly mcp: {
        readonly tools: Readonly<Record<string, readonly McpTool[]>>;
        readonly failures: Readonly<Record<string, string>>;
        readonly registry: { readonly query: string; readonly entries: readonly McpRegistryEntry[] };
        readonly configure: { readonly server: McpServerConfig; readonly errors: readonly string[] } | null;
        readonly authorizeUrl: string | null;
    };
    readonly models: {
        readonly providers: readonly ProviderInfo[];
        readonly query: string;
        readonly providerId: string | null;
        readonly results: readonly ModelInfo[];
        /** A choice made with no editor open, held for the next new profile */
        readonly selected: ModelChoice | null;
    };
    readonly notifications: readonly { readonly message: string; readonly level: NotificationLevel }[];
    readonly error: { readonly title: string; readonly message: string; readonly severity: ErrorSeverity } | null;
    readonly modal: { readonly modal: ModalId; readonly targetId: string } | null;
}

// ─── Initial state ────────────────────────────────────────────────

function emptyChat(showThinking = false): ChatState {
    return {
        conversationId: null,
        title: null,
        transcript: [],
        streamingText: '',
        thinkingText: '',
        isStreaming: false,
        isThinking: false,
        showThinking,
        toolCalls: [],
        lastTokens: null,
        rename: null,
    };
}

export function initialViewState(): ViewState {
    return {
        chat: emptyChat(),
        history: { summaries: [], count: 0 },
        settings: { loaded: false, profiles: [], mcpServers: [], hotkey: '', theme: 'dark' },
        profileTests: {},
        profileEditor: null,
        mcp: { tools: {}, failures: {}, registry: { query: '', entries: [] }, configure: null, authorizeUrl: null },
        models: { providers: [], query: '', providerId: null, results: [], selected: null },
        notifications: [],
        error: null,
        modal: null,
    };
}

// ─── Reducer ──────────────────────────────────────────────────────

export function applyViewCommand(state: ViewState, command: ViewCommand): ViewState {
    switch (command.type) {
        // ── Chat ──
        case 'conversation_created':
        case 'conversation_activated':
            if (state.chat.conversationId === command.id) {
                return withChat(state, { title: command.title });
            }
            return { ...state, chat: { ...emptyChat(state.chat.showThinking), conversationId: command.id, title: command.title } };

        case 'conversation_loaded': {
            const transcript = command.messages.map((m): TranscriptEntry => ({
                role: m.role,
                content: m.content,
                ...(m.thinking ? { thinking: m.thinking } : {}),
            }));
            if (state.chat.conversationId === command.id) {
                return withChat(state, { title: command.title, transcript });
            }
            return {
                ...state,
                chat: { ...emptyChat(state.chat.showThinking), conversationId: command.id, title: command.title, transcript },
            };
        }

        case 'conversation_cleared':
            return { ...state, chat: emptyChat(state.chat.showThinking) };

        case 'message_appended':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, {
                conversationId: command.conversationId,
                transcript: [...state.chat.transcript, { role: command.role, content: command.content }],
            });

        case 'show_thinking':
            return withChat(state, { isThinking: true });

        case 'hide_thinking':
            return withChat(state, { isThinking: false });

        case 'append_stream':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, { streamingText: state.chat.streamingText + command.text, isStreaming: true });

        case 'append_thinking':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, { thinkingText: state.chat.thinkingText + command.text, isStreaming: true });

        case 'finalize_stream':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, {
                ...closeStream(state.chat, { role: 'assistant', content: state.chat.streamingText, ...thinkingOf(state.chat) }),
                lastTokens: command.tokens,
            });

        case 'stream_cancelled':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(
                state,
                closeStream(state.chat, { role: 'assistant', content: command.partialContent, outcome: 'cancelled' }),
            );

        case 'stream_error':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, closeStream(state.chat, { role: 'system', content: command.error, outcome: 'error' }));

        case 'show_tool_call':
            if (!isCurrent(state, command.conversationId)) return state;
            return withChat(state, {
                toolCalls: [...state.chat.toolCalls, { id: command.toolCallId, name: command.toolName, status: 'running' }],
            });

        case 'update_tool_call':
            return withChat(state, {
                toolCalls: state.chat.toolCalls.map((call) =>
                    call.id === command.toolCallId
                        ? { ...call, status: command.status, result: command.result, durationMs: command.durationMs }
                        : call,
                ),
            });

        case 'message_saved':
            return state;

        case 'toggle_thinking_visibility':
            return withChat(state, { showThinking: !state.chat.showThinking });

        case 'conversation_rename_started':
            return withChat(state, { rename: { id: command.id, title: command.currentTitle } });

        case 'conversation_renamed': {
            const renamed = retitle(state, command.id, command.title);
            return withChat(renamed, { rename: null });
        }

        case 'conversation_rename_cancelled':
            return withChat(state, { rename: null });

        // ── History ──
        case 'conversation_list_refreshed':
            return { ...state, history: { summaries: command.summaries, count: command.summaries.length } };

        case 'history_updated':
            return { ...state, history: { ...state.history, count: command.count } };

        case 'conversation_deleted': {
            const summaries = state.history.summaries.filter((s) => s.id !== command.id);
            const chat = state.chat.conversationId === command.id ? emptyChat(state.chat.showThinking) : state.chat;
            return { ...state, chat, history: { summaries, count: summaries.length } };
        }

        case 'conversation_title_updated':
            return retitle(state, command.id, command.title);

        // ── Settings & profiles ──
        case 'show_settings':
            return {
                ...state,
                settings: {
                    loaded: true,
                    profiles: command.profiles,
                    mcpServers: command.mcpServers,
                    hotkey: command.hotkey,
                    theme: command.theme,
                },
            };

        case 'settings_updated':
            return { ...state, settings: { ...state.settings, hotkey: command.hotkey, theme: command.theme } };

        case 'show_notification':
            return {
                ...state,
                notifications: [...state.notifications.slice(-(MAX_NOTIFICATIONS - 1)), { message: command.message, level: command.level }],
            };

        case 'profile_created':
        case 'profile_updated':
            return withProfiles(state, upsertProfile(state.settings.profiles, command.id, command.name));

        case 'profile_deleted': {
            const { [command.id]: _dropped, ...profileTests } = state.profileTests;
            return {
                ...withProfiles(
                    state,
                    state.settings.profiles.filter((p) => p.id !== command.id),
                ),
                profileTests,
            };
        }

        case 'default_profile_changed':
            return withProfiles(
                state,
                state.settings.profiles.map((p) => ({ ...p, isDefault: p.id === command.id })),
            );

        case 'profile_test_started':
            return { ...state, profileTests: { ...state.profileTests, [command.id]: { status: 'running' } } };

        case 'profile_test_completed':
            return {
                ...state,
                profileTests: {
                    ...state.profileTests,
                    [command.id]: {
                        status: command.success ? 'passed' : 'failed',
                        responseTimeMs: command.responseTimeMs,
                        ...(command.error ? { error: command.error } : {}),
                    },
                },
            };

        case 'profile_editor_loaded': {
            const pending = command.mode === 'create' ? state.models.selected : null;
            return {
                ...state,
                profileEditor: { mode: command.mode, draft: pending ? withModel(command.draft, pending) : command.draft, errors: [] },
                models: pending ? { ...state.models, selected: null } : state.models,
            };
        }

        case 'profile_validation_failed':
            if (!state.profileEditor) return state;
            return { ...state, profileEditor: { ...state.profileEditor, errors: command.errors } };

        case 'profile_saved':
            return { ...state, profileEditor: null };

        // ── MCP ──
        case 'mcp_server_started':
            return withServer(
                state,
                command.id,
                (s) => ({ ...s, status: 'running', toolCount: command.toolCount }),
                clearFailure(state, command.id),
            );

        case 'mcp_server_failed':
            return withServer(state, command.id, (s) => ({ ...s, status: 'failed', toolCount: 0 }), {
                ...state.mcp.failures,
                [command.id]: command.error,
            });

        case 'mcp_status_changed':
            return withServer(state, command.id, (s) => ({ ...s, status: command.status }), state.mcp.failures);

        case 'mcp_tools_updated':
            return { ...state, mcp: { ...state.mcp, tools: { ...state.mcp.tools, [command.id]: command.tools } } };

        case 'mcp_config_saved': {
            const configure = state.mcp.configure;
            if (!configure || configure.server.id !== command.id) return state;
            return { ...state, mcp: { ...state.mcp, configure: { ...configure, errors: [] } } };
        }

        case 'mcp_deleted': {
            const { [command.id]: _tools, ...tools } = state.mcp.tools;
            const configure = state.mcp.configure?.server.id === command.id ? null : state.mcp.configure;
            return {
                ...state,
                settings: { ...state.settings, mcpServers: state.settings.mcpServers.filter((s) => s.id !== command.id) },
                mcp: { ...state.mcp, tools, failures: clearFailure(state, command.id), configure },
            };
        }

        case 'mcp_registry_results':
            return { ...state, mcp: { ...state.mcp, registry: { query: command.query, entries: command.entries } } };

        case 'mcp_configure_loaded':
            return { ...state, mcp: { ...state.mcp, configure: { server: command.server, errors: [] }, authorizeUrl: null } };

        case 'mcp_validation_failed':
            if (!state.mcp.configure) return state;
            return { ...state, mcp: { ...state.mcp, configure: { ...state.mcp.configure, errors: command.errors } } };

        case 'open_url':
            return { ...state, mcp: { ...state.mcp, authorizeUrl: command.url } };

        // ── Models ──
        case 'model_providers_listed':
            return { ...state, models: { ...state.models, providers: command.providers } };

        case 'model_search_results':
            return {
                ...state,
                models: { ...state.models, query: command.query, providerId: command.providerId, results: command.models },
            };

        case 'model_selected': {
            const choice: ModelChoice = {
                providerId: command.providerId,
                modelId: command.modelId,
                ...(command.baseUrl ? { baseUrl: command.baseUrl } : {}),
            };
            if (state.profileEditor) {
                return { ...state, profileEditor: { ...state.profileEditor, draft: withModel(state.profileEditor.draft, choice) } };
            }
            return {
                ...state,
                models: { ...state.models, selected: choice },
                notifications: [
                    ...state.notifications.slice(-(MAX_NOTIFICATIONS - 1)),
                    { message: `${choice.providerId}/${choice.modelId} will be used for the next new profile`, level: 'info' },
                ],
            };
        }

        // ── Errors ──
        case 'show_error':
            return { ...state, error: { title: command.title, message: command.message, severity: command.severity } };

        case 'clear_error':
            return { ...state, error: null };

        // ── Navigation ──
        case 'show_modal':
            return { ...state, modal: { modal: command.modal, targetId: command.targetId } };

        case 'dismiss_modal':
            return { ...state, modal: null };

        case 'navigate_to':
        case 'navigate_back':
            return state;
    }
}

/** Keep what the user typed in the profile editor while another view is open */
export function keepProfileDraft(state: ViewState, draft: ProfileDraft): ViewState {
    if (!state.profileEditor) return state;
    return { ...state, profileEditor: { ...state.profileEditor, draft } };
}

export function closeProfileEditor(state: ViewState): ViewState {
    return state.profileEditor ? { ...state, profileEditor: null } : state;
}

// ── Private ───────────────────────────────────────────────────────

function withChat(state: ViewState, patch: Partial<ChatState>): ViewState {
    return { ...state, chat: { ...state.chat, ...patch } };
}

/** Commands for another conversation are stale; an empty panel adopts any */
function isCurrent(state: ViewState, conversationId: string): boolean {
    return state.chat.conversationId === null || state.chat.conversationId === conversationId;
}

function thinkingOf(chat: ChatState): { thinking?: string } {
    return chat.thinkingText ? { thinking: chat.thinkingText } : {};
}

function closeStream(chat: ChatState, entry: TranscriptEntry): Partial<ChatState> {
    return {
        transcript: [...chat.transcript, entry],
        streamingText: '',
        thinkingText: '',
        isStreaming: false,
        toolCalls: [],
    };
}

function retitle(state: ViewState, id: string, title: string): ViewState {
    return {
        ...state,
        chat: state.chat.conversationId === id ? { ...state.chat, title } : state.chat,
        history: {
            ...state.history,
            summaries: state.history.summaries.map((s) => (s.id === id ? { ...s, title } : s)),
        },
    };
}

// A custom base URL survives picking another model from the same provider
function withModel(draft: ProfileDraft, choice: ModelChoice): ProfileDraft {
    const sameProvider = draft.providerId === choice.providerId;
    return {
        ...draft,
        providerId: choice.providerId,
        modelId: choice.modelId,
        baseUrl: sameProvider ? (draft.baseUrl ?? choice.baseUrl) : choice.baseUrl,
    };
}

function withProfiles(state: ViewState, profiles: readonly ProfileSummary[]): ViewState {
    return { ...state, settings: { ...state.settings, profiles } };
}

function upsertProfile(profiles: readonly ProfileSummary[], id: string, name: string): ProfileSummary[] {
    if (profiles.some((p) => p.id === id)) {
        return profiles.map((p) => (p.id === id ? { ...p, name } : p));
    }
    return [...profiles, { id, name, providerId: '', modelId: '', isDefault: false }];
}

function withServer(
    state: ViewState,
    id: string,
    update: (server: McpServerSummary) => McpServerSummary,
    failures: Readonly<Record<string, string>>,
): ViewState {
    return {
        ...state,
        settings: {
            ...state.settings,
            mcpServers: state.settings.mcpServers.map((s) => (s.id === id ? update(s) : s)),
        },
        mcp: { ...state.mcp, failures },
    };
}

function clearFailure(state: ViewState, id: string): Readonly<Record<string, string>> {
    const { [id]: _cleared, ...rest } = state.mcp.failures;
    return rest;
}
