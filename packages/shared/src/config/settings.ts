/**
 * @perch/shared: Settings
 *
 * Persistent preferences and runtime knobs stored in ~/.perch/config.json
 * (or $PERCH_HOME/config.json). The file is validated with zod; anything
 * missing falls back to the defaults below, and an unreadable file is
 * treated as absent.
 *
 * Security: directory is created with 0o700, config file with 0o600.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import {
    CONFIG_DIR_NAME,
    DEFAULT_BUS_CAPACITY,
    DEFAULT_FRAME_INTERVAL_MS,
    DEFAULT_HOTKEY,
    DEFAULT_STREAM_CHUNK_DELAY_MS,
    DEFAULT_THEME,
    DEFAULT_USER_EVENT_CAPACITY,
    DEFAULT_VIEW_COMMAND_CAPACITY,
} from '../constants.js';
import { LOG_LEVELS, createLogger } from '../utils/logger.js';

const log = createLogger('Settings');

// ─── Schema ───────────────────────────────────────────────────────

const CURRENT_VERSION = 1;

export const PerchConfigSchema = z.object({
    version: z.number().int().default(CURRENT_VERSION),
    busCapacity: z.number().int().positive().default(DEFAULT_BUS_CAPACITY),
    userEventCapacity: z.number().int().positive().default(DEFAULT_USER_EVENT_CAPACITY),
    viewCommandCapacity: z.number().int().positive().default(DEFAULT_VIEW_COMMAND_CAPACITY),
    frameIntervalMs: z.number().int().positive().default(DEFAULT_FRAME_INTERVAL_MS),
    streamChunkDelayMs: z.number().int().nonnegative().default(DEFAULT_STREAM_CHUNK_DELAY_MS),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    hotkey: z.string().min(1).default(DEFAULT_HOTKEY),
    theme: z.enum(['dark', 'light', 'system']).default(DEFAULT_THEME),
    defaultProfileId: z.string().nullable().default(null),
    currentConversationId: z.string().nullable().default(null),
});

export type PerchConfig = z.infer<typeof PerchConfigSchema>;

/** Environment variables that override the file, with the key they set */
const ENV_OVERRIDES = {
    PERCH_BUS_CAPACITY: 'busCapacity',
    PERCH_FRAME_MS: 'frameIntervalMs',
    PERCH_LOG_LEVEL: 'logLevel',
} as const satisfies Record<string, keyof PerchConfig>;

// ─── Settings Class ───────────────────────────────────────────────

export class Settings {
    /** In-memory cache to avoid repeated disk reads */
    private static cache: PerchConfig | undefined = undefined;

    /** Path to the settings directory, honouring $PERCH_HOME */
    static get dir(): string {
        return process.env['PERCH_HOME'] || join(homedir(), CONFIG_DIR_NAME);
    }

    static get configPath(): string {
        return join(this.dir, 'config.json');
    }

    static exists(): boolean {
        return existsSync(this.configPath);
    }

    static defaults(): PerchConfig {
        return PerchConfigSchema.parse({});
    }

    /** Read config from disk (with in-memory cache); defaults when absent or invalid */
    static read(): PerchConfig {
        if (this.cache !== undefined) return this.cache;

        if (!this.exists()) {
            this.cache = this.defaults();
            return this.cache;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
        } catch (err) {
            log.warn(`Could not parse ${this.configPath}, using defaults`, err);
            this.cache = this.defaults();
            return this.cache;
        }

        const parsed = PerchConfigSchema.safeParse(raw);
        if (!parsed.success) {
            log.warn(`Invalid settings in ${this.configPath}: ${parsed.error.issues.map((i) => i.path.join('.')).join(', ')}`);
            this.cache = this.defaults();
            return this.cache;
        }

        this.cache = parsed.data;
        return this.cache;
    }

    /** Write config to disk and update cache */
    static write(config: PerchConfig): void {
        const dir = this.dir;
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true, mode: 0o700 });
        }

        writeFileSync(this.configPath, JSON.stringify(config, null, 2), {
            encoding: 'utf-8',
            mode: 0o600,
        });

        this.cache = config;
    }

    /** Shallow-merge a patch into the stored config and persist it */
    static update(patch: Partial<PerchConfig>): PerchConfig {
        const next = PerchConfigSchema.parse({ ...this.read(), ...patch });
        this.write(next);
        return next;
    }

    /**
     * Stored config with environment overrides applied. Overrides are
     * never written back; an invalid override is ignored with a warning.
     */
    static resolve(env: NodeJS.ProcessEnv = process.env): PerchConfig {
        const base = this.read();
        const overrides: Record<string, unknown> = {};

        for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
            const value = env[name];
            if (value === undefined || value === '') continue;

            const candidate = key === 'logLevel' ? value : Number(value);
            const field = PerchConfigSchema.shape[key].safeParse(candidate);
            if (field.success) {
                overrides[key] = field.data;
            } else {
                log.warn(`Ignoring ${name}=${value}`);
            }
        }

        return { ...base, ...overrides };
    }

    /** Clear the in-memory cache (forces next read from disk) */
    static clearCache(): void {
        this.cache = undefined;
    }

    static get schemaVersion(): number {
        return CURRENT_VERSION;
    }
}
