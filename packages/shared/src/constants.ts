/**
 * @perch/shared: Constants
 *
 * Central source of truth for channel capacities, timings and
 * preference defaults shared across the core and the UI.
 */

export const APP_NAME = 'perch';
export const APP_VERSION = '0.1.0';

/** Directory under the user's home that holds config.json */
export const CONFIG_DIR_NAME = '.perch';

// ─── Channels ─────────────────────────────────────────────────────

/** Ring size of the application event bus */
export const DEFAULT_BUS_CAPACITY = 100;
/** UI → core queue of user events */
export const DEFAULT_USER_EVENT_CAPACITY = 64;
/** core → UI queue of view commands */
export const DEFAULT_VIEW_COMMAND_CAPACITY = 256;

// ─── Timing ───────────────────────────────────────────────────────

export const DEFAULT_FRAME_INTERVAL_MS = 16; // ~60 fps
export const DEFAULT_STREAM_CHUNK_DELAY_MS = 25;
export const PROFILE_TEST_TIMEOUT_MS = 10_000;

// ─── Preferences ──────────────────────────────────────────────────

export const DEFAULT_HOTKEY = 'Cmd+Shift+Space';
export const DEFAULT_THEME = 'dark';
export const DEFAULT_CONVERSATION_TITLE = 'New Conversation';
export const DEFAULT_CONVERSATION_PAGE_SIZE = 50;
