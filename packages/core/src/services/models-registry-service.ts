/**
 * @perch/core: ModelsRegistryService contract
 *
 * `refresh` publishes `system:models_registry_refreshed` or
 * `system:models_registry_refresh_failed`.
 */

import type { ModelInfo, ProviderInfo } from '@perch/shared';

export interface ModelsRegistryService {
    refresh(): Promise<void>;
    getModel(providerId: string, modelId: string): Promise<ModelInfo | null>;
    getProvider(id: string): Promise<ProviderInfo | null>;
    listProviders(): Promise<ProviderInfo[]>;
    listAll(): Promise<ModelInfo[]>;
    /** Case-insensitive match on id or name, optionally within one provider */
    search(query: string, providerId?: string | null): Promise<ModelInfo[]>;
    getLastRefresh(): Date | null;
}
