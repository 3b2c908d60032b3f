/**
 * @perch/core: Error Presenter
 *
 * Turns failures reported on the bus into the error dialog. Failures of
 * a presenter's own service calls are shown by that presenter.
 */

import type { AppEvent } from '@perch/shared';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export class ErrorPresenter extends Presenter {
    constructor(context: PresenterContext) {
        super('ErrorPresenter', context);
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        switch (event.type) {
            case 'system': {
                const sys = event.payload;
                if (sys.type === 'error') {
                    const message = sys.context ? `${sys.error} (${sys.context})` : sys.error;
                    this.showError(`${sys.source} Error`, message, 'critical');
                } else if (sys.type === 'models_registry_refresh_failed') {
                    this.showError('Model Registry', sys.error, 'warning');
                }
                return;
            }

            case 'chat':
                if (event.payload.type === 'stream_error') {
                    this.showError('Chat Error', event.payload.error, event.payload.recoverable ? 'warning' : 'error');
                }
                return;

            case 'mcp': {
                const mcp = event.payload;
                if (mcp.type === 'start_failed') {
                    this.showError('MCP Server Failed', `${mcp.name}: ${mcp.error}`, 'error');
                } else if (mcp.type === 'unhealthy') {
                    this.showError('MCP Server Unhealthy', `${mcp.name}: ${mcp.error}`, 'warning');
                }
                return;
            }

            case 'user':
                if (event.payload.type === 'dismiss_error') this.emit({ type: 'clear_error' });
                return;

            default:
                return;
        }
    }
}
