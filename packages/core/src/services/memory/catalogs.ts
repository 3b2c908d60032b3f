/**
 * @perch/core: Bundled registry catalogs
 *
 * Seed data for the in-memory MCP and model registries, read from
 * packages/core/data and validated on load.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ServiceError, describeError } from '@perch/shared';
import type { McpRegistryEntry, McpTool, ModelInfo, ProviderInfo } from '@perch/shared';

const DATA_DIR = new URL('../../../data/', import.meta.url);

// ─── Schemas ──────────────────────────────────────────────────────

const McpToolSchema = z.object({ name: z.string(), description: z.string() });

const McpRegistryCatalogSchema = z.object({
    entries: z.array(
        z.object({
            name: z.string().min(1),
            title: z.string().min(1),
            description: z.string(),
            source: z.enum(['official', 'community']),
            tags: z.array(z.string()),
            transport: z.enum(['stdio', 'http']),
            command: z.string().optional(),
            args: z.array(z.string()).default([]),
            url: z.string().url().optional(),
            envKeys: z.array(z.string()).default([]),
            oauthProvider: z.string().optional(),
            popularity: z.number().default(0),
        }),
    ),
    tools: z.record(z.array(McpToolSchema)).default({}),
});

const ModelsCatalogSchema = z.object({
    providers: z.array(z.object({ id: z.string().min(1), name: z.string(), apiBaseUrl: z.string().url().optional() })),
    models: z.array(
        z.object({
            id: z.string().min(1),
            providerId: z.string().min(1),
            name: z.string(),
            contextWindow: z.number().int().positive(),
            supportsTools: z.boolean(),
            supportsReasoning: z.boolean(),
        }),
    ),
});

export interface McpRegistryCatalog {
    readonly entries: readonly McpRegistryEntry[];
    /** Tools each registry server exposes once running, keyed by entry name */
    readonly tools: Readonly<Record<string, readonly McpTool[]>>;
}

export interface ModelsCatalog {
    readonly providers: readonly ProviderInfo[];
    readonly models: readonly ModelInfo[];
}

// ─── Loaders ──────────────────────────────────────────────────────

function readJson(file: string): unknown {
    const url = new URL(file, DATA_DIR);
    try {
        return JSON.parse(readFileSync(url, 'utf-8'));
    } catch (err) {
        throw new ServiceError('io', `Cannot read ${file}: ${describeError(err)}`, { cause: err });
    }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, file: string, raw: unknown): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ServiceError('serialization', `${file} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
}

export function loadMcpRegistryCatalog(): McpRegistryCatalog {
    return parseWith(McpRegistryCatalogSchema, 'mcp-registry.json', readJson('mcp-registry.json'));
}

export function loadModelsCatalog(): ModelsCatalog {
    return parseWith(ModelsCatalogSchema, 'models-registry.json', readJson('models-registry.json'));
}
