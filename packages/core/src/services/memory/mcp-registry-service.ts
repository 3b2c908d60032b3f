/**
 * @perch/core: Catalog-backed McpRegistryService
 */

import type { McpRegistryEntry, McpRegistrySource, McpTool } from '@perch/shared';
import type { McpRegistryService } from '../mcp-registry-service.js';
import { loadMcpRegistryCatalog } from './catalogs.js';
import type { McpRegistryCatalog } from './catalogs.js';

function byPopularity(a: McpRegistryEntry, b: McpRegistryEntry): number {
    return b.popularity - a.popularity || a.name.localeCompare(b.name);
}

export class CatalogMcpRegistryService implements McpRegistryService {
    private catalog: McpRegistryCatalog;
    private lastRefresh: Date | null = null;

    constructor(private readonly load: () => McpRegistryCatalog = loadMcpRegistryCatalog) {
        this.catalog = load();
    }

    async search(query: string, source: McpRegistrySource): Promise<McpRegistryEntry[]> {
        const needle = query.trim().toLowerCase();
        return this.catalog.entries
            .filter((e) => source === 'all' || e.source === source)
            .filter(
                (e) =>
                    !needle ||
                    e.name.toLowerCase().includes(needle) ||
                    e.title.toLowerCase().includes(needle) ||
                    e.description.toLowerCase().includes(needle) ||
                    e.tags.some((t) => t.toLowerCase() === needle),
            )
            .sort(byPopularity);
    }

    async getDetails(name: string): Promise<McpRegistryEntry | null> {
        return this.catalog.entries.find((e) => e.name === name) ?? null;
    }

    async listAll(): Promise<McpRegistryEntry[]> {
        return [...this.catalog.entries].sort(byPopularity);
    }

    async listByTag(tag: string): Promise<McpRegistryEntry[]> {
        const wanted = tag.toLowerCase();
        return this.catalog.entries.filter((e) => e.tags.some((t) => t.toLowerCase() === wanted)).sort(byPopularity);
    }

    async listTrending(limit: number): Promise<McpRegistryEntry[]> {
        return [...this.catalog.entries].sort(byPopularity).slice(0, Math.max(0, limit));
    }

    async refresh(): Promise<void> {
        this.catalog = this.load();
        this.lastRefresh = new Date();
    }

    getLastRefresh(): Date | null {
        return this.lastRefresh;
    }

    /** Tools a server installed from `registryName` exposes */
    toolsFor(registryName: string | undefined): readonly McpTool[] {
        if (!registryName) return [];
        return this.catalog.tools[registryName] ?? [];
    }
}
