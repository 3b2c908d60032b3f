/**
 * @perch/shared: View Identifiers
 */

export type ViewId =
    | 'chat'
    | 'history'
    | 'settings'
    | 'profile_editor'
    | 'mcp_add'
    | 'mcp_configure'
    | 'model_selector';

/** Root of the navigation stack; never popped */
export const HOME_VIEW: ViewId = 'chat';

export const VIEW_TITLES: Record<ViewId, string> = {
    chat: 'Chat',
    history: 'History',
    settings: 'Settings',
    profile_editor: 'Profile',
    mcp_add: 'Add MCP Server',
    mcp_configure: 'Configure MCP Server',
    model_selector: 'Select Model',
};

export type ModalId = 'confirm_delete_conversation' | 'confirm_delete_profile' | 'confirm_delete_mcp';

export type ErrorSeverity = 'info' | 'warning' | 'error' | 'critical';

export type Theme = 'dark' | 'light' | 'system';
