export { Presenter } from './presenter.js';
export type { Outcome, PresenterContext } from './presenter.js';
export { ChatPresenter } from './chat-presenter.js';
export type { ChatPresenterServices } from './chat-presenter.js';
export { HistoryPresenter } from './history-presenter.js';
export { SettingsPresenter } from './settings-presenter.js';
export type { SettingsPresenterServices } from './settings-presenter.js';
export { ProfileEditorPresenter } from './profile-editor-presenter.js';
export type { ProfileEditorServices } from './profile-editor-presenter.js';
export { McpAddPresenter, configFromRegistry } from './mcp-add-presenter.js';
export type { McpAddServices } from './mcp-add-presenter.js';
export { McpConfigurePresenter } from './mcp-configure-presenter.js';
export { ModelSelectorPresenter } from './model-selector-presenter.js';
export { ErrorPresenter } from './error-presenter.js';
