/**
 * @perch/shared: View Commands
 *
 * One command is one UI mutation. Presenters produce them, the UI render
 * loop drains and applies them to its own state. Commands carry data
 * only, never callbacks.
 */

import type {
    ChatMessage,
    ConversationSummary,
    McpRegistryEntry,
    McpServerConfig,
    McpServerSummary,
    McpStatus,
    McpTool,
    MessageRole,
    ModelInfo,
    ProfileDraft,
    ProfileSummary,
    ProviderInfo,
} from './domain.js';
import type { ErrorSeverity, ModalId, Theme, ViewId } from './view.js';

export type ToolCallStatus = 'running' | 'completed' | 'failed';
export type NotificationLevel = 'info' | 'success' | 'warning';

export type ViewCommand =
    // ── Chat ──
    | { readonly type: 'conversation_created'; readonly id: string; readonly title: string }
    | { readonly type: 'conversation_activated'; readonly id: string; readonly title: string }
    | {
          readonly type: 'conversation_loaded';
          readonly id: string;
          readonly title: string;
          readonly messages: readonly ChatMessage[];
      }
    | { readonly type: 'conversation_cleared' }
    | { readonly type: 'message_appended'; readonly conversationId: string; readonly role: MessageRole; readonly content: string }
    | { readonly type: 'show_thinking' }
    | { readonly type: 'hide_thinking' }
    | { readonly type: 'append_stream'; readonly conversationId: string; readonly text: string }
    | { readonly type: 'append_thinking'; readonly conversationId: string; readonly text: string }
    | {
          readonly type: 'finalize_stream';
          readonly conversationId: string;
          readonly messageId: string;
          readonly tokens: number | null;
      }
    | { readonly type: 'stream_cancelled'; readonly conversationId: string; readonly partialContent: string }
    | { readonly type: 'stream_error'; readonly conversationId: string; readonly error: string; readonly recoverable: boolean }
    | {
          readonly type: 'show_tool_call';
          readonly conversationId: string;
          readonly toolCallId: string;
          readonly toolName: string;
      }
    | {
          readonly type: 'update_tool_call';
          readonly toolCallId: string;
          readonly status: ToolCallStatus;
          readonly result: string;
          readonly durationMs: number;
      }
    | { readonly type: 'message_saved'; readonly conversationId: string; readonly messageId: string }
    | { readonly type: 'toggle_thinking_visibility' }
    | { readonly type: 'conversation_rename_started'; readonly id: string; readonly currentTitle: string }
    | { readonly type: 'conversation_renamed'; readonly id: string; readonly title: string }
    | { readonly type: 'conversation_rename_cancelled' }
    // ── History ──
    | { readonly type: 'conversation_list_refreshed'; readonly summaries: readonly ConversationSummary[] }
    | { readonly type: 'history_updated'; readonly count: number }
    | { readonly type: 'conversation_deleted'; readonly id: string }
    | { readonly type: 'conversation_title_updated'; readonly id: string; readonly title: string }
    // ── Settings & profiles ──
    | {
          readonly type: 'show_settings';
          readonly profiles: readonly ProfileSummary[];
          readonly mcpServers: readonly McpServerSummary[];
          readonly hotkey: string;
          readonly theme: Theme;
      }
    | { readonly type: 'settings_updated'; readonly hotkey: string; readonly theme: Theme }
    | { readonly type: 'show_notification'; readonly message: string; readonly level: NotificationLevel }
    | { readonly type: 'profile_created'; readonly id: string; readonly name: string }
    | { readonly type: 'profile_updated'; readonly id: string; readonly name: string }
    | { readonly type: 'profile_deleted'; readonly id: string }
    | { readonly type: 'default_profile_changed'; readonly id: string }
    | { readonly type: 'profile_test_started'; readonly id: string }
    | {
          readonly type: 'profile_test_completed';
          readonly id: string;
          readonly success: boolean;
          readonly responseTimeMs: number;
          readonly error?: string;
      }
    | { readonly type: 'profile_editor_loaded'; readonly mode: 'create' | 'edit'; readonly draft: ProfileDraft }
    | { readonly type: 'profile_validation_failed'; readonly errors: readonly string[] }
    | { readonly type: 'profile_saved'; readonly id: string }
    // ── MCP ──
    | { readonly type: 'mcp_server_started'; readonly id: string; readonly toolCount: number }
    | { readonly type: 'mcp_server_failed'; readonly id: string; readonly error: string }
    | { readonly type: 'mcp_tools_updated'; readonly id: string; readonly tools: readonly McpTool[] }
    | { readonly type: 'mcp_status_changed'; readonly id: string; readonly status: McpStatus }
    | { readonly type: 'mcp_config_saved'; readonly id: string }
    | { readonly type: 'mcp_deleted'; readonly id: string }
    | { readonly type: 'mcp_registry_results'; readonly query: string; readonly entries: readonly McpRegistryEntry[] }
    | { readonly type: 'mcp_configure_loaded'; readonly server: McpServerConfig }
    | { readonly type: 'mcp_validation_failed'; readonly errors: readonly string[] }
    | { readonly type: 'open_url'; readonly url: string }
    // ── Models ──
    | { readonly type: 'model_providers_listed'; readonly providers: readonly ProviderInfo[] }
    | {
          readonly type: 'model_search_results';
          readonly query: string;
          readonly providerId: string | null;
          readonly models: readonly ModelInfo[];
      }
    | { readonly type: 'model_selected'; readonly providerId: string; readonly modelId: string; readonly baseUrl?: string }
    // ── Errors ──
    | { readonly type: 'show_error'; readonly title: string; readonly message: string; readonly severity: ErrorSeverity }
    | { readonly type: 'clear_error' }
    // ── Navigation ──
    | { readonly type: 'navigate_to'; readonly view: ViewId }
    | { readonly type: 'navigate_back' }
    | { readonly type: 'show_modal'; readonly modal: ModalId; readonly targetId: string }
    | { readonly type: 'dismiss_modal' };

export type ViewCommandType = ViewCommand['type'];
