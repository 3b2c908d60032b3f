/**
 * @perch/shared: Domain Model
 *
 * Conversations, model profiles, MCP servers and the model registry as
 * they cross the service boundary. Drafts coming from editors are
 * validated with zod before a service ever sees them.
 */

import { z } from 'zod';

// ─── Conversations ────────────────────────────────────────────────

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export interface ChatMessage {
    readonly id: string;
    readonly role: MessageRole;
    readonly content: string;
    /** Reasoning text captured while the reply streamed, if any */
    readonly thinking?: string;
    readonly createdAt: string;
}

export interface Conversation {
    readonly id: string;
    readonly title: string;
    readonly profileId: string;
    readonly createdAt: string;
    readonly updatedAt: string;
    readonly messages: readonly ChatMessage[];
}

export interface ConversationSummary {
    readonly id: string;
    readonly title: string;
    readonly messageCount: number;
    readonly updatedAt: string;
    readonly isActive: boolean;
}

// ─── Model Profiles ───────────────────────────────────────────────

export interface ModelParameters {
    readonly temperature: number;
    readonly maxTokens: number;
    readonly thinkingEnabled: boolean;
}

export interface ModelProfile {
    readonly id: string;
    readonly name: string;
    readonly providerId: string;
    readonly modelId: string;
    readonly baseUrl?: string;
    readonly systemPrompt?: string;
    /** Key under which SecretsService holds the API key */
    readonly apiKeyRef?: string;
    readonly parameters: ModelParameters;
}

export type NewProfile = Omit<ModelProfile, 'id'>;

export interface ProfileSummary {
    readonly id: string;
    readonly name: string;
    readonly providerId: string;
    readonly modelId: string;
    readonly isDefault: boolean;
}

export interface ConnectionTestResult {
    readonly success: boolean;
    readonly responseTimeMs: number;
    readonly error?: string;
}

export const ProfileDraftSchema = z.object({
    id: z.string().optional(),
    name: z.string().trim().min(1, 'Name is required').max(64, 'Name must be at most 64 characters'),
    providerId: z.string().trim().min(1, 'Provider is required'),
    modelId: z.string().trim().min(1, 'Model is required'),
    baseUrl: z.string().url('Base URL must be a valid URL').optional(),
    apiKey: z.string().optional(),
    systemPrompt: z.string().optional(),
    temperature: z.number().min(0, 'Temperature must be between 0 and 2').max(2, 'Temperature must be between 0 and 2').default(0.7),
    maxTokens: z.number().int().positive('Max tokens must be positive').default(4096),
    thinkingEnabled: z.boolean().default(false),
});

/** What the editor holds and sends back; defaults are filled on parse */
export type ProfileDraft = z.input<typeof ProfileDraftSchema>;
export type ValidProfileDraft = z.output<typeof ProfileDraftSchema>;

export function blankProfileDraft(): ProfileDraft {
    return {
        name: '',
        providerId: '',
        modelId: '',
        temperature: 0.7,
        maxTokens: 4096,
        thinkingEnabled: false,
    };
}

export function profileToDraft(profile: ModelProfile): ProfileDraft {
    return {
        id: profile.id,
        name: profile.name,
        providerId: profile.providerId,
        modelId: profile.modelId,
        baseUrl: profile.baseUrl,
        systemPrompt: profile.systemPrompt,
        temperature: profile.parameters.temperature,
        maxTokens: profile.parameters.maxTokens,
        thinkingEnabled: profile.parameters.thinkingEnabled,
    };
}

// ─── MCP Servers ──────────────────────────────────────────────────

export type McpStatus = 'starting' | 'running' | 'stopped' | 'failed' | 'unhealthy';
export type McpTransport = 'stdio' | 'http';

export interface McpServerConfig {
    readonly id: string;
    readonly name: string;
    readonly transport: McpTransport;
    readonly command?: string;
    readonly args: readonly string[];
    readonly url?: string;
    readonly env: Readonly<Record<string, string>>;
    readonly enabled: boolean;
    /** Registry entry the server was installed from */
    readonly registryName?: string;
    readonly oauthProvider?: string;
}

export interface McpServerSummary {
    readonly id: string;
    readonly name: string;
    readonly enabled: boolean;
    readonly status: McpStatus;
    readonly toolCount: number;
}

export interface McpTool {
    readonly name: string;
    readonly description: string;
}

export const McpConfigSchema = z
    .object({
        name: z.string().trim().min(1, 'Name is required'),
        transport: z.enum(['stdio', 'http']),
        command: z.string().trim().min(1).optional(),
        args: z.array(z.string()).default([]),
        url: z.string().url('URL must be valid').optional(),
        env: z.record(z.string()).default({}),
        enabled: z.boolean().default(true),
        registryName: z.string().optional(),
        oauthProvider: z.string().optional(),
    })
    .superRefine((cfg, ctx) => {
        if (cfg.transport === 'stdio' && !cfg.command) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'Command is required for stdio servers' });
        }
        if (cfg.transport === 'http' && !cfg.url) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'URL is required for http servers' });
        }
    });

export type McpConfigDraft = z.input<typeof McpConfigSchema>;
export type ValidMcpConfig = z.output<typeof McpConfigSchema>;

export type McpRegistrySource = 'all' | 'official' | 'community';

export interface McpRegistryEntry {
    readonly name: string;
    readonly title: string;
    readonly description: string;
    readonly source: Exclude<McpRegistrySource, 'all'>;
    readonly tags: readonly string[];
    readonly transport: McpTransport;
    readonly command?: string;
    readonly args: readonly string[];
    readonly url?: string;
    /** Environment variables the user must supply before the server can start */
    readonly envKeys: readonly string[];
    readonly oauthProvider?: string;
    readonly popularity: number;
}

// ─── Models Registry ──────────────────────────────────────────────

export interface ProviderInfo {
    readonly id: string;
    readonly name: string;
    readonly apiBaseUrl?: string;
}

export interface ModelInfo {
    readonly id: string;
    readonly providerId: string;
    readonly name: string;
    readonly contextWindow: number;
    readonly supportsTools: boolean;
    readonly supportsReasoning: boolean;
}

/** Flattens zod issues into `field: message` lines for the editors */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
