/**
 * @perch/core: McpService contract
 *
 * Lifecycle changes are reported as `mcp:*` events; callers should not
 * assume a server is running when `setEnabled` resolves.
 */

import type { McpServerConfig, McpStatus, McpTool, ValidMcpConfig } from '@perch/shared';

export interface McpService {
    list(): Promise<McpServerConfig[]>;
    get(id: string): Promise<McpServerConfig>;
    getStatus(id: string): Promise<McpStatus>;
    setEnabled(id: string, enabled: boolean): Promise<void>;
    getAvailableTools(id: string): Promise<McpTool[]>;
    add(config: ValidMcpConfig): Promise<McpServerConfig>;
    update(id: string, config: ValidMcpConfig): Promise<McpServerConfig>;
    delete(id: string): Promise<void>;
    restart(id: string): Promise<void>;
    listEnabled(): Promise<McpServerConfig[]>;
    /** Authorization URL the user must open to grant the server access */
    beginOAuth(id: string): Promise<string>;
}
