/**
 * @perch/core: Simulated McpService
 *
 * Tracks server configs and a lifecycle status without spawning anything;
 * process management belongs to the external MCP client. Starting a
 * server succeeds when every env value it declares is filled in, and its
 * tools come from the registry catalog. `reportHealth` is the hook an
 * external health checker calls.
 */

import { v4 as uuidv4 } from 'uuid';
import { AppEvents, ServiceError } from '@perch/shared';
import type { AppEvent, McpEvent, McpServerConfig, McpStatus, McpTool, ValidMcpConfig } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { McpService } from '../mcp-service.js';

/** Tools a server exposes once running */
export type ToolResolver = (config: McpServerConfig) => readonly McpTool[];

interface Entry {
    config: McpServerConfig;
    status: McpStatus;
    tools: readonly McpTool[];
}

export interface SimulatedMcpOptions {
    readonly seed?: readonly McpServerConfig[];
    readonly tools?: ToolResolver;
}

export class SimulatedMcpService implements McpService {
    private readonly servers = new Map<string, Entry>();
    private readonly resolveTools: ToolResolver;

    constructor(
        private readonly events: EventPublisher<AppEvent>,
        options: SimulatedMcpOptions = {},
    ) {
        this.resolveTools = options.tools ?? (() => []);
        for (const config of options.seed ?? []) {
            this.servers.set(config.id, { config, status: 'stopped', tools: [] });
        }
    }

    async list(): Promise<McpServerConfig[]> {
        return [...this.servers.values()].map((e) => e.config);
    }

    async get(id: string): Promise<McpServerConfig> {
        return this.require(id).config;
    }

    async getStatus(id: string): Promise<McpStatus> {
        return this.require(id).status;
    }

    async setEnabled(id: string, enabled: boolean): Promise<void> {
        const entry = this.require(id);
        if (entry.config.enabled === enabled) return;

        entry.config = { ...entry.config, enabled };
        if (enabled) this.launch(entry);
        else this.halt(entry);
    }

    async getAvailableTools(id: string): Promise<McpTool[]> {
        const entry = this.require(id);
        return entry.status === 'running' ? [...entry.tools] : [];
    }

    async add(config: ValidMcpConfig): Promise<McpServerConfig> {
        this.ensureUniqueName(config.name, null);
        const entry: Entry = { config: { ...config, id: uuidv4() }, status: 'stopped', tools: [] };
        this.servers.set(entry.config.id, entry);
        this.emit({ type: 'config_saved', id: entry.config.id });

        if (entry.config.enabled) this.launch(entry);
        return entry.config;
    }

    async update(id: string, config: ValidMcpConfig): Promise<McpServerConfig> {
        const entry = this.require(id);
        this.ensureUniqueName(config.name, id);
        const wasRunning = entry.status === 'running';

        entry.config = { ...config, id };
        this.emit({ type: 'config_saved', id });

        if (!entry.config.enabled) {
            if (entry.status !== 'stopped') this.halt(entry);
        } else if (wasRunning) {
            this.emit({ type: 'restarting', id, name: entry.config.name, attempt: 1 });
            this.launch(entry);
        } else {
            this.launch(entry);
        }
        return entry.config;
    }

    async delete(id: string): Promise<void> {
        const entry = this.require(id);
        if (entry.status !== 'stopped') this.halt(entry);
        this.servers.delete(id);
        this.emit({ type: 'deleted', id });
    }

    async restart(id: string): Promise<void> {
        const entry = this.require(id);
        if (!entry.config.enabled) throw ServiceError.validation(`${entry.config.name} is disabled`);
        this.emit({ type: 'restarting', id, name: entry.config.name, attempt: 1 });
        this.launch(entry);
    }

    async listEnabled(): Promise<McpServerConfig[]> {
        return [...this.servers.values()].filter((e) => e.config.enabled).map((e) => e.config);
    }

    async beginOAuth(id: string): Promise<string> {
        const { config } = this.require(id);
        if (!config.oauthProvider) {
            throw ServiceError.validation(`${config.name} does not use OAuth`);
        }
        const url = new URL('/login/oauth/authorize', `https://${config.oauthProvider}`);
        url.searchParams.set('client_id', 'perch');
        url.searchParams.set('state', id);
        return url.toString();
    }

    /** Health report from the process supervisor */
    reportHealth(id: string, healthy: boolean, error = 'Health check failed'): void {
        const entry = this.servers.get(id);
        if (!entry) return;

        const name = entry.config.name;
        if (!healthy && entry.status === 'running') {
            entry.status = 'unhealthy';
            this.emit({ type: 'unhealthy', id, name, error });
        } else if (healthy && entry.status === 'unhealthy') {
            entry.status = 'running';
            this.emit({ type: 'recovered', id, name });
        }
    }

    // ── Private ───────────────────────────────────────────────────

    private launch(entry: Entry): void {
        const { id, name } = entry.config;
        entry.status = 'starting';
        this.emit({ type: 'starting', id, name });

        const missing = Object.entries(entry.config.env)
            .filter(([, value]) => value.trim() === '')
            .map(([key]) => key);
        if (missing.length > 0) {
            entry.status = 'failed';
            entry.tools = [];
            this.emit({ type: 'start_failed', id, name, error: `Missing environment variable(s): ${missing.join(', ')}` });
            return;
        }

        entry.status = 'running';
        entry.tools = this.resolveTools(entry.config);
        this.emit({ type: 'started', id, name, tools: entry.tools.map((t) => t.name), toolCount: entry.tools.length });
    }

    private halt(entry: Entry): void {
        entry.status = 'stopped';
        entry.tools = [];
        this.emit({ type: 'stopped', id: entry.config.id, name: entry.config.name });
    }

    private ensureUniqueName(name: string, selfId: string | null): void {
        for (const { config } of this.servers.values()) {
            if (config.id !== selfId && config.name === name) {
                throw ServiceError.validation(`An MCP server named "${name}" already exists`);
            }
        }
    }

    private require(id: string): Entry {
        const entry = this.servers.get(id);
        if (!entry) throw ServiceError.notFound(`MCP server ${id}`);
        return entry;
    }

    private emit(event: McpEvent): void {
        this.events.publish(AppEvents.mcp(event));
    }
}
