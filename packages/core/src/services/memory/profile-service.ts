/**
 * @perch/core: In-memory ProfileService
 *
 * Connection testing goes through a `probe`; the default only checks that
 * the profile names a provider and model, since real requests belong to
 * the external agent library.
 */

import { v4 as uuidv4 } from 'uuid';
import { AppEvents, PROFILE_TEST_TIMEOUT_MS, ServiceError, describeError } from '@perch/shared';
import type { AppEvent, ConnectionTestResult, ModelProfile, NewProfile, ProfileEvent } from '@perch/shared';
import type { EventPublisher } from '../../events/event-bus.js';
import type { ProfileService } from '../profile-service.js';

export type ConnectionProbe = (profile: ModelProfile) => Promise<ConnectionTestResult>;

export interface MemoryProfileServiceOptions {
    readonly seed?: readonly ModelProfile[];
    readonly defaultId?: string | null;
    readonly probe?: ConnectionProbe;
    /** A probe still pending after this long counts as failed */
    readonly testTimeoutMs?: number;
}

const basicProbe: ConnectionProbe = async (profile) =>
    profile.providerId && profile.modelId
        ? { success: true, responseTimeMs: 0 }
        : { success: false, responseTimeMs: 0, error: 'Profile has no provider or model' };

export class MemoryProfileService implements ProfileService {
    private readonly profiles = new Map<string, ModelProfile>();
    private defaultId: string | null;
    private readonly probe: ConnectionProbe;
    private readonly testTimeoutMs: number;

    constructor(
        private readonly events: EventPublisher<AppEvent>,
        options: MemoryProfileServiceOptions = {},
    ) {
        for (const profile of options.seed ?? []) this.profiles.set(profile.id, profile);
        this.defaultId = options.defaultId ?? options.seed?.[0]?.id ?? null;
        this.probe = options.probe ?? basicProbe;
        this.testTimeoutMs = options.testTimeoutMs ?? PROFILE_TEST_TIMEOUT_MS;
    }

    async list(): Promise<ModelProfile[]> {
        return [...this.profiles.values()].sort((a, b) => a.name.localeCompare(b.name));
    }

    async get(id: string): Promise<ModelProfile> {
        return this.require(id);
    }

    async create(input: NewProfile): Promise<ModelProfile> {
        this.validateName(input.name, null);
        const profile: ModelProfile = { ...input, id: uuidv4() };
        this.profiles.set(profile.id, profile);
        this.emit({ type: 'created', id: profile.id, name: profile.name });

        if (this.defaultId === null) {
            this.defaultId = profile.id;
            this.emit({ type: 'default_changed', from: null, to: profile.id });
        }
        return profile;
    }

    async update(profile: ModelProfile): Promise<ModelProfile> {
        this.require(profile.id);
        this.validateName(profile.name, profile.id);
        this.profiles.set(profile.id, profile);
        this.emit({ type: 'updated', id: profile.id, name: profile.name });
        return profile;
    }

    async delete(id: string): Promise<void> {
        this.require(id);
        this.profiles.delete(id);
        this.emit({ type: 'deleted', id });

        if (this.defaultId === id) {
            const next = [...this.profiles.keys()][0] ?? null;
            this.defaultId = next;
            if (next) this.emit({ type: 'default_changed', from: id, to: next });
        }
    }

    async testConnection(id: string): Promise<ConnectionTestResult> {
        const profile = this.require(id);
        this.emit({ type: 'test_started', id });

        const started = Date.now();
        let result: ConnectionTestResult;
        try {
            result = await this.probeWithTimeout(profile);
        } catch (err) {
            result = { success: false, responseTimeMs: Date.now() - started, error: describeError(err) };
        }

        this.emit({ type: 'test_completed', id, ...result });
        return result;
    }

    async getDefault(): Promise<ModelProfile | null> {
        return this.defaultId ? (this.profiles.get(this.defaultId) ?? null) : null;
    }

    async setDefault(id: string): Promise<void> {
        this.require(id);
        if (this.defaultId === id) return;
        const from = this.defaultId;
        this.defaultId = id;
        this.emit({ type: 'default_changed', from, to: id });
    }

    // ── Private ───────────────────────────────────────────────────

    private async probeWithTimeout(profile: ModelProfile): Promise<ConnectionTestResult> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(ServiceError.network(`No response within ${this.testTimeoutMs}ms`)), this.testTimeoutMs);
        });
        try {
            return await Promise.race([this.probe(profile), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    private validateName(name: string, selfId: string | null): void {
        if (!name.trim()) throw ServiceError.validation('Profile name cannot be empty');
        for (const other of this.profiles.values()) {
            if (other.id !== selfId && other.name.toLowerCase() === name.trim().toLowerCase()) {
                throw ServiceError.validation(`A profile named "${name.trim()}" already exists`);
            }
        }
    }

    private require(id: string): ModelProfile {
        const profile = this.profiles.get(id);
        if (!profile) throw ServiceError.notFound(`profile ${id}`);
        return profile;
    }

    private emit(event: ProfileEvent): void {
        this.events.publish(AppEvents.profile(event));
    }
}
