/**
 * @perch/core: Model Selector Presenter
 *
 * Searchable model list with an optional provider filter. The current
 * query and filter live here so a registry refresh can re-run them. A
 * selection carries the provider's API base URL for the profile editor.
 */

import type { AppEvent, UserEvent } from '@perch/shared';
import type { ModelsRegistryService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

const TITLE = 'Model Registry';

export class ModelSelectorPresenter extends Presenter {
    private query = '';
    private providerId: string | null = null;
    private open = false;

    constructor(
        context: PresenterContext,
        private readonly registry: ModelsRegistryService,
    ) {
        super('ModelSelectorPresenter', context);
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type === 'user') return this.onUser(event.payload);

        if (event.type === 'system' && event.payload.type === 'models_registry_refreshed' && this.open) {
            await this.search();
        }
    }

    private async onUser(event: UserEvent): Promise<void> {
        switch (event.type) {
            case 'open_model_selector': {
                this.query = '';
                this.providerId = null;
                this.open = true;
                const providers = await this.attempt(TITLE, () => this.registry.listProviders());
                if (providers.ok) this.emit({ type: 'model_providers_listed', providers: providers.value });
                await this.search();
                this.navigateTo('model_selector');
                return;
            }

            case 'search_models':
                this.query = event.query.trim();
                await this.search();
                return;

            case 'filter_models_by_provider':
                this.providerId = event.providerId;
                await this.search();
                return;

            case 'select_model': {
                const found = await this.attempt(TITLE, async () => ({
                    model: await this.registry.getModel(event.providerId, event.modelId),
                    provider: await this.registry.getProvider(event.providerId),
                }));
                if (!found.ok) return;
                if (!found.value.model) {
                    this.showError('Unknown Model', `${event.providerId}/${event.modelId} is not in the registry`, 'warning');
                    return;
                }
                this.open = false;
                const baseUrl = found.value.provider?.apiBaseUrl;
                this.emit({
                    type: 'model_selected',
                    providerId: event.providerId,
                    modelId: event.modelId,
                    ...(baseUrl ? { baseUrl } : {}),
                });
                this.navigateBack();
                return;
            }

            case 'navigate_back':
                this.open = false;
                return;

            default:
                return;
        }
    }

    private async search(): Promise<void> {
        const { query, providerId } = this;
        const found = await this.attempt(TITLE, () => this.registry.search(query, providerId), 'warning');
        if (found.ok) this.emit({ type: 'model_search_results', query, providerId, models: found.value });
    }
}
