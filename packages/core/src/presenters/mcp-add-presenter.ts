/**
 * @perch/core: MCP Add Presenter
 *
 * Browse the MCP registry and install a server from it. A freshly added
 * server opens in the configure view so required env values can be filled.
 */

import type { AppEvent, McpRegistryEntry, ValidMcpConfig } from '@perch/shared';
import type { McpRegistryService, McpService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export interface McpAddServices {
    readonly registry: McpRegistryService;
    readonly mcp: McpService;
}

const TRENDING_LIMIT = 10;
const TITLE = 'MCP Registry';

/** Config for a registry entry; disabled until required env values are set */
export function configFromRegistry(entry: McpRegistryEntry): ValidMcpConfig {
    return {
        name: entry.title,
        transport: entry.transport,
        command: entry.command,
        args: [...entry.args],
        url: entry.url,
        env: Object.fromEntries(entry.envKeys.map((key) => [key, ''])),
        enabled: entry.envKeys.length === 0,
        registryName: entry.name,
        oauthProvider: entry.oauthProvider,
    };
}

export class McpAddPresenter extends Presenter {
    private readonly registry: McpRegistryService;
    private readonly mcp: McpService;

    constructor(context: PresenterContext, services: McpAddServices) {
        super('McpAddPresenter', context);
        this.registry = services.registry;
        this.mcp = services.mcp;
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type !== 'user') return;
        const user = event.payload;

        switch (user.type) {
            case 'add_mcp': {
                this.navigateTo('mcp_add');
                const trending = await this.attempt(TITLE, () => this.registry.listTrending(TRENDING_LIMIT), 'warning');
                if (trending.ok) this.emit({ type: 'mcp_registry_results', query: '', entries: trending.value });
                return;
            }

            case 'search_mcp_registry': {
                const query = user.query.trim();
                const found = await this.attempt(TITLE, () => this.registry.search(query, user.source), 'warning');
                if (found.ok) this.emit({ type: 'mcp_registry_results', query, entries: found.value });
                return;
            }

            case 'select_mcp_from_registry': {
                const details = await this.attempt(TITLE, () => this.registry.getDetails(user.name));
                if (!details.ok) return;
                if (!details.value) {
                    this.showError('Server Not Found', `No registry entry named "${user.name}"`, 'warning');
                    return;
                }

                const entry = details.value;
                const added = await this.attempt('Install Failed', () => this.mcp.add(configFromRegistry(entry)));
                if (!added.ok) return;

                this.log.info(`Installed ${entry.name} as ${added.value.id}`);
                this.emit({ type: 'mcp_configure_loaded', server: added.value });
                this.navigateTo('mcp_configure');
                return;
            }

            default:
                return;
        }
    }
}
