/**
 * @perch/core: Catalog-backed ModelsRegistryService
 */

import { AppEvents, ServiceError, describeError } from '@perch/shared';
import type { AppEvent, ModelInfo, ProviderInfo } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { ModelsRegistryService } from '../models-registry-service.js';
import { loadModelsCatalog } from './catalogs.js';
import type { ModelsCatalog } from './catalogs.js';

export class CatalogModelsRegistryService implements ModelsRegistryService {
    private catalog: ModelsCatalog = { providers: [], models: [] };
    private lastRefresh: Date | null = null;

    constructor(
        private readonly events: EventPublisher<AppEvent>,
        private readonly load: () => ModelsCatalog = loadModelsCatalog,
    ) {}

    async refresh(): Promise<void> {
        let next: ModelsCatalog;
        try {
            next = this.load();
        } catch (err) {
            const error = describeError(err);
            this.events.publish(AppEvents.system({ type: 'models_registry_refresh_failed', error }));
            throw err instanceof ServiceError ? err : ServiceError.internal(error, err);
        }

        this.catalog = next;
        this.lastRefresh = new Date();
        this.events.publish(
            AppEvents.system({
                type: 'models_registry_refreshed',
                providerCount: next.providers.length,
                modelCount: next.models.length,
            }),
        );
    }

    async getModel(providerId: string, modelId: string): Promise<ModelInfo | null> {
        return this.catalog.models.find((m) => m.providerId === providerId && m.id === modelId) ?? null;
    }

    async getProvider(id: string): Promise<ProviderInfo | null> {
        return this.catalog.providers.find((p) => p.id === id) ?? null;
    }

    async listProviders(): Promise<ProviderInfo[]> {
        return [...this.catalog.providers];
    }

    async listAll(): Promise<ModelInfo[]> {
        return [...this.catalog.models];
    }

    async search(query: string, providerId: string | null = null): Promise<ModelInfo[]> {
        const needle = query.trim().toLowerCase();
        return this.catalog.models.filter(
            (m) =>
                (providerId === null || m.providerId === providerId) &&
                (!needle || m.id.toLowerCase().includes(needle) || m.name.toLowerCase().includes(needle)),
        );
    }

    getLastRefresh(): Date | null {
        return this.lastRefresh;
    }
}
