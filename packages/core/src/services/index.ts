/**
 * @perch/core: Service registry
 *
 * The one place that names every service. Presenters receive these
 * interfaces, never the implementations.
 */

import type { AppSettingsService } from './app-settings-service.js';
import type { ChatService } from './chat-service.js';
import type { ConversationService } from './conversation-service.js';
import type { McpRegistryService } from './mcp-registry-service.js';
import type { McpService } from './mcp-service.js';
import type { ModelsRegistryService } from './models-registry-service.js';
import type { ProfileService } from './profile-service.js';
import type { SecretsService } from './secrets-service.js';

export type {
    AppSettingsService,
    ChatService,
    ConversationService,
    McpRegistryService,
    McpService,
    ModelsRegistryService,
    ProfileService,
    SecretsService,
};
export { apiKeyRef } from './secrets-service.js';

export interface Services {
    readonly conversations: ConversationService;
    readonly chat: ChatService;
    readonly profiles: ProfileService;
    readonly mcp: McpService;
    readonly mcpRegistry: McpRegistryService;
    readonly modelsRegistry: ModelsRegistryService;
    readonly appSettings: AppSettingsService;
    readonly secrets: SecretsService;
}
