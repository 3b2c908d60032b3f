/**
 * @perch/core: McpRegistryService contract
 */

import type { McpRegistryEntry, McpRegistrySource } from '@perch/shared';

export interface McpRegistryService {
    search(query: string, source: McpRegistrySource): Promise<McpRegistryEntry[]>;
    getDetails(name: string): Promise<McpRegistryEntry | null>;
    listAll(): Promise<McpRegistryEntry[]>;
    listByTag(tag: string): Promise<McpRegistryEntry[]>;
    listTrending(limit: number): Promise<McpRegistryEntry[]>;
    refresh(): Promise<void>;
    getLastRefresh(): Date | null;
}
