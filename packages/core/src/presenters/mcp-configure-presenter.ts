/**
 * @perch/core: MCP Configure Presenter
 */

import { McpConfigSchema, formatIssues } from '@perch/shared';
import type { AppEvent } from '@perch/shared';
import type { McpService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export class McpConfigurePresenter extends Presenter {
    constructor(
        context: PresenterContext,
        private readonly mcp: McpService,
    ) {
        super('McpConfigurePresenter', context);
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type === 'mcp') {
            const change = event.payload;
            if (change.type === 'config_saved') {
                this.emit({ type: 'mcp_config_saved', id: change.id });
            } else if (change.type === 'started') {
                await this.loadTools(change.id);
            }
            return;
        }

        if (event.type !== 'user') return;
        const user = event.payload;

        switch (user.type) {
            case 'configure_mcp': {
                const server = await this.attempt('MCP Error', () => this.mcp.get(user.id));
                if (!server.ok) return;
                this.emit({ type: 'mcp_configure_loaded', server: server.value });
                await this.loadTools(user.id);
                this.navigateTo('mcp_configure');
                return;
            }

            case 'save_mcp_config': {
                const parsed = McpConfigSchema.safeParse(user.config);
                if (!parsed.success) {
                    this.emit({ type: 'mcp_validation_failed', errors: formatIssues(parsed.error) });
                    return;
                }
                const saved = await this.attempt('Save Failed', () => this.mcp.update(user.id, parsed.data));
                if (saved.ok) this.navigateBack();
                return;
            }

            case 'start_mcp_oauth': {
                const url = await this.attempt('Authorization Failed', () => this.mcp.beginOAuth(user.id));
                if (url.ok) this.emit({ type: 'open_url', url: url.value });
                return;
            }

            default:
                return;
        }
    }

    private async loadTools(id: string): Promise<void> {
        const tools = await this.attempt('MCP Error', () => this.mcp.getAvailableTools(id), 'warning');
        if (tools.ok) this.emit({ type: 'mcp_tools_updated', id, tools: tools.value });
    }
}
