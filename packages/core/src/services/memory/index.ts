export { MemoryConversationService } from './conversation-service.js';
export { EchoChatService } from './chat-service.js';
export type { EchoChatOptions } from './chat-service.js';
export { MemoryProfileService } from './profile-service.js';
export type { ConnectionProbe, MemoryProfileServiceOptions } from './profile-service.js';
export { SimulatedMcpService } from './mcp-service.js';
export type { SimulatedMcpOptions, ToolResolver } from './mcp-service.js';
export { CatalogMcpRegistryService } from './mcp-registry-service.js';
export { CatalogModelsRegistryService } from './models-registry-service.js';
export { ConfigAppSettingsService, memorySettingsStore } from './app-settings-service.js';
export type { SettingsStore } from './app-settings-service.js';
export { MemorySecretsService } from './secrets-service.js';
export { loadMcpRegistryCatalog, loadModelsCatalog } from './catalogs.js';
export type { McpRegistryCatalog, ModelsCatalog } from './catalogs.js';
