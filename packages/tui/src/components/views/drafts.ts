/**
 * @perch/tui: Editor drafts
 *
 * Converts between the drafts the presenters speak and the flat string
 * fields the form views edit. Nothing is validated here; the presenters
 * run the zod schemas and report back.
 */

import type { McpConfigDraft, McpServerConfig, McpTransport, ProfileDraft } from '@perch/shared';
import type { Field } from '../form/FieldList.js';

export type FieldValues = Readonly<Record<string, string>>;

export function withValue(fields: readonly Field[], key: string, value: string): Field[] {
    return fields.map((field) => (field.key === key ? { ...field, value } : field));
}

export function valuesOf(fields: readonly Field[]): FieldValues {
    return Object.fromEntries(fields.map((field) => [field.key, field.value]));
}

function optional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function isYes(value: string | undefined): boolean {
    return ['y', 'yes', 'true', 'on'].includes((value ?? '').trim().toLowerCase());
}

// ─── Profiles ─────────────────────────────────────────────────────

export function profileFields(draft: ProfileDraft): Field[] {
    return [
        { key: 'name', label: 'Name', value: draft.name },
        { key: 'providerId', label: 'Provider', value: draft.providerId, hint: 'openai, anthropic, ollama...' },
        { key: 'modelId', label: 'Model', value: draft.modelId },
        { key: 'baseUrl', label: 'Base URL', value: draft.baseUrl ?? '', hint: 'optional' },
        { key: 'apiKey', label: 'API key', value: draft.apiKey ?? '', secret: true, hint: 'leave empty to keep' },
        { key: 'systemPrompt', label: 'System prompt', value: draft.systemPrompt ?? '', hint: 'optional' },
        { key: 'temperature', label: 'Temperature', value: String(draft.temperature ?? 0.7) },
        { key: 'maxTokens', label: 'Max tokens', value: String(draft.maxTokens ?? 4096) },
        { key: 'thinkingEnabled', label: 'Thinking', value: draft.thinkingEnabled ? 'yes' : 'no', hint: 'yes | no' },
    ];
}

/** Numbers that do not parse are passed on as NaN for the schema to reject */
export function toProfileDraft(values: FieldValues, id: string | undefined): ProfileDraft {
    return {
        id,
        name: values['name'] ?? '',
        providerId: values['providerId'] ?? '',
        modelId: values['modelId'] ?? '',
        baseUrl: optional(values['baseUrl']),
        apiKey: optional(values['apiKey']),
        systemPrompt: optional(values['systemPrompt']),
        temperature: Number(values['temperature']),
        maxTokens: Number(values['maxTokens']),
        thinkingEnabled: isYes(values['thinkingEnabled']),
    };
}

// ─── MCP servers ──────────────────────────────────────────────────

/** `KEY=value, OTHER=value`; entries without `=` are dropped */
export function parseEnv(text: string): Record<string, string> {
    const env: Record<string, string> = {};
    for (const pair of text.split(',')) {
        const eq = pair.indexOf('=');
        if (eq <= 0) continue;
        const key = pair.slice(0, eq).trim();
        if (key) env[key] = pair.slice(eq + 1).trim();
    }
    return env;
}

export function formatEnv(env: Readonly<Record<string, string>>): string {
    return Object.entries(env)
        .map(([key, value]) => `${key}=${value}`)
        .join(', ');
}

function toTransport(value: string | undefined): McpTransport {
    return value?.trim().toLowerCase() === 'http' ? 'http' : 'stdio';
}

export function mcpFields(server: McpServerConfig): Field[] {
    return [
        { key: 'name', label: 'Name', value: server.name },
        { key: 'transport', label: 'Transport', value: server.transport, hint: 'stdio | http' },
        { key: 'command', label: 'Command', value: server.command ?? '', hint: 'stdio only' },
        { key: 'args', label: 'Arguments', value: server.args.join(' ') },
        { key: 'url', label: 'URL', value: server.url ?? '', hint: 'http only' },
        { key: 'env', label: 'Environment', value: formatEnv(server.env), hint: 'KEY=value, ...' },
        { key: 'enabled', label: 'Enabled', value: server.enabled ? 'yes' : 'no', hint: 'yes | no' },
    ];
}

/** Keeps the registry link and OAuth provider of the server being edited */
export function toMcpDraft(values: FieldValues, server: McpServerConfig): McpConfigDraft {
    const args = (values['args'] ?? '').trim();
    return {
        name: values['name'] ?? '',
        transport: toTransport(values['transport']),
        command: optional(values['command']),
        args: args ? args.split(/\s+/) : [],
        url: optional(values['url']),
        env: parseEnv(values['env'] ?? ''),
        enabled: isYes(values['enabled']),
        registryName: server.registryName,
        oauthProvider: server.oauthProvider,
    };
}
