/**
 * @perch/shared: Application Events
 *
 * Everything that flows through the event bus. `AppEvent` is a closed
 * union of sub-unions keyed on `type`; each sub-union is itself keyed on
 * `type`. Payloads are plain data (strings, numbers, ids) so an event
 * can be shared by every subscriber without copying.
 *
 * User events come from the UI through the bridge. All other families
 * are published by services, or by presenters that need another
 * presenter to react.
 */

import type { McpConfigDraft, McpRegistrySource, ProfileDraft } from './domain.js';
import type { ModalId, Theme, ViewId } from './view.js';

// ─── User (UI → core) ─────────────────────────────────────────────

export type UserEvent =
    // Chat
    | { readonly type: 'send_message'; readonly text: string }
    | { readonly type: 'stop_streaming' }
    | { readonly type: 'new_conversation' }
    | { readonly type: 'toggle_thinking' }
    | { readonly type: 'start_rename_conversation'; readonly id: string }
    | { readonly type: 'confirm_rename_conversation'; readonly id: string; readonly title: string }
    | { readonly type: 'cancel_rename_conversation' }
    // History
    | { readonly type: 'select_conversation'; readonly id: string }
    | { readonly type: 'delete_conversation'; readonly id: string }
    | { readonly type: 'confirm_delete_conversation'; readonly id: string }
    // Profiles
    | { readonly type: 'select_profile'; readonly id: string }
    | { readonly type: 'create_profile' }
    | { readonly type: 'edit_profile'; readonly id: string }
    | { readonly type: 'save_profile'; readonly draft: ProfileDraft }
    | { readonly type: 'delete_profile'; readonly id: string }
    | { readonly type: 'confirm_delete_profile'; readonly id: string }
    | { readonly type: 'test_profile_connection'; readonly id: string }
    // MCP
    | { readonly type: 'toggle_mcp'; readonly id: string; readonly enabled: boolean }
    | { readonly type: 'add_mcp' }
    | { readonly type: 'search_mcp_registry'; readonly query: string; readonly source: McpRegistrySource }
    | { readonly type: 'select_mcp_from_registry'; readonly name: string }
    | { readonly type: 'configure_mcp'; readonly id: string }
    | { readonly type: 'save_mcp_config'; readonly id: string; readonly config: McpConfigDraft }
    | { readonly type: 'delete_mcp'; readonly id: string }
    | { readonly type: 'confirm_delete_mcp'; readonly id: string }
    | { readonly type: 'start_mcp_oauth'; readonly id: string }
    // Models
    | { readonly type: 'open_model_selector' }
    | { readonly type: 'search_models'; readonly query: string }
    | { readonly type: 'filter_models_by_provider'; readonly providerId: string | null }
    | { readonly type: 'select_model'; readonly providerId: string; readonly modelId: string }
    // Preferences
    | { readonly type: 'set_hotkey'; readonly hotkey: string }
    | { readonly type: 'set_theme'; readonly theme: Theme }
    // Navigation and dialogs
    | { readonly type: 'navigate'; readonly to: ViewId }
    | { readonly type: 'navigate_back' }
    | { readonly type: 'dismiss_modal' }
    | { readonly type: 'dismiss_error' };

// ─── Chat (streaming) ─────────────────────────────────────────────

export type ChatEvent =
    | { readonly type: 'stream_started'; readonly conversationId: string; readonly messageId: string; readonly modelId: string }
    | { readonly type: 'text_delta'; readonly conversationId: string; readonly text: string }
    | { readonly type: 'thinking_delta'; readonly conversationId: string; readonly text: string }
    | {
          readonly type: 'tool_call_started';
          readonly conversationId: string;
          readonly toolCallId: string;
          readonly toolName: string;
      }
    | {
          readonly type: 'tool_call_completed';
          readonly conversationId: string;
          readonly toolCallId: string;
          readonly toolName: string;
          readonly success: boolean;
          readonly result: string;
          readonly durationMs: number;
      }
    | {
          readonly type: 'stream_completed';
          readonly conversationId: string;
          readonly messageId: string;
          readonly totalTokens: number | null;
      }
    | {
          readonly type: 'stream_cancelled';
          readonly conversationId: string;
          readonly messageId: string;
          readonly partialContent: string;
      }
    | { readonly type: 'stream_error'; readonly conversationId: string; readonly error: string; readonly recoverable: boolean }
    | { readonly type: 'message_saved'; readonly conversationId: string; readonly messageId: string };

// ─── MCP server lifecycle ─────────────────────────────────────────

export type McpEvent =
    | { readonly type: 'starting'; readonly id: string; readonly name: string }
    | { readonly type: 'started'; readonly id: string; readonly name: string; readonly tools: readonly string[]; readonly toolCount: number }
    | { readonly type: 'start_failed'; readonly id: string; readonly name: string; readonly error: string }
    | { readonly type: 'stopped'; readonly id: string; readonly name: string }
    | { readonly type: 'unhealthy'; readonly id: string; readonly name: string; readonly error: string }
    | { readonly type: 'recovered'; readonly id: string; readonly name: string }
    | { readonly type: 'restarting'; readonly id: string; readonly name: string; readonly attempt: number }
    | { readonly type: 'tool_called'; readonly id: string; readonly toolName: string }
    | {
          readonly type: 'tool_completed';
          readonly id: string;
          readonly toolName: string;
          readonly success: boolean;
          readonly durationMs: number;
      }
    | { readonly type: 'config_saved'; readonly id: string }
    | { readonly type: 'deleted'; readonly id: string };

// ─── Profiles ─────────────────────────────────────────────────────

export type ProfileEvent =
    | { readonly type: 'created'; readonly id: string; readonly name: string }
    | { readonly type: 'updated'; readonly id: string; readonly name: string }
    | { readonly type: 'deleted'; readonly id: string }
    | { readonly type: 'default_changed'; readonly from: string | null; readonly to: string }
    | { readonly type: 'test_started'; readonly id: string }
    | {
          readonly type: 'test_completed';
          readonly id: string;
          readonly success: boolean;
          readonly responseTimeMs: number;
          readonly error?: string;
      }
    | { readonly type: 'validation_failed'; readonly id: string | null; readonly errors: readonly string[] };

// ─── Conversations ────────────────────────────────────────────────

export type ConversationEvent =
    | { readonly type: 'created'; readonly id: string; readonly title: string }
    | { readonly type: 'loaded'; readonly id: string }
    | { readonly type: 'title_updated'; readonly id: string; readonly title: string }
    | { readonly type: 'deleted'; readonly id: string }
    | { readonly type: 'activated'; readonly id: string }
    | { readonly type: 'deactivated'; readonly id: string }
    | { readonly type: 'list_refreshed'; readonly count: number };

// ─── Navigation ───────────────────────────────────────────────────

export type NavigationEvent =
    | { readonly type: 'navigating'; readonly to: ViewId }
    | { readonly type: 'back_requested' }
    | { readonly type: 'modal_presented'; readonly modal: ModalId; readonly targetId: string }
    | { readonly type: 'modal_dismissed'; readonly modal: ModalId | null };

// ─── System ───────────────────────────────────────────────────────

export type SystemEvent =
    | { readonly type: 'app_launched' }
    | { readonly type: 'app_will_terminate' }
    | { readonly type: 'config_loaded' }
    | { readonly type: 'config_saved' }
    | { readonly type: 'hotkey_changed'; readonly hotkey: string }
    | { readonly type: 'theme_changed'; readonly theme: Theme }
    | { readonly type: 'error'; readonly source: string; readonly error: string; readonly context?: string }
    | { readonly type: 'models_registry_refreshed'; readonly providerCount: number; readonly modelCount: number }
    | { readonly type: 'models_registry_refresh_failed'; readonly error: string };

// ─── Envelope ─────────────────────────────────────────────────────

export type AppEvent =
    | { readonly type: 'user'; readonly payload: UserEvent }
    | { readonly type: 'chat'; readonly payload: ChatEvent }
    | { readonly type: 'mcp'; readonly payload: McpEvent }
    | { readonly type: 'profile'; readonly payload: ProfileEvent }
    | { readonly type: 'conversation'; readonly payload: ConversationEvent }
    | { readonly type: 'navigation'; readonly payload: NavigationEvent }
    | { readonly type: 'system'; readonly payload: SystemEvent };

export type AppEventFamily = AppEvent['type'];

/** `family:variant`, e.g. `chat:text_delta`; used in log lines */
export function describeEvent(event: AppEvent): string {
    return `${event.type}:${event.payload.type}`;
}

// ─── Constructors ─────────────────────────────────────────────────

export const AppEvents = {
    user: (payload: UserEvent): AppEvent => ({ type: 'user', payload }),
    chat: (payload: ChatEvent): AppEvent => ({ type: 'chat', payload }),
    mcp: (payload: McpEvent): AppEvent => ({ type: 'mcp', payload }),
    profile: (payload: ProfileEvent): AppEvent => ({ type: 'profile', payload }),
    conversation: (payload: ConversationEvent): AppEvent => ({ type: 'conversation', payload }),
    navigation: (payload: NavigationEvent): AppEvent => ({ type: 'navigation', payload }),
    system: (payload: SystemEvent): AppEvent => ({ type: 'system', payload }),
} as const;
