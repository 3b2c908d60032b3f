/**
 * @perch/core: In-memory SecretsService
 *
 * Keychain access is platform code outside this package; this keeps
 * secrets for the lifetime of the process only.
 */

import { ServiceError } from '@perch/shared';
import type { SecretsService } from '../secrets-service.js';
import { apiKeyRef } from '../secrets-service.js';

export class MemorySecretsService implements SecretsService {
    private readonly secrets = new Map<string, string>();

    async store(key: string, value: string): Promise<void> {
        if (!key.trim()) throw ServiceError.validation('Secret key cannot be empty');
        if (!value) throw ServiceError.validation(`Secret ${key} cannot be empty`);
        this.secrets.set(key, value);
    }

    async get(key: string): Promise<string | null> {
        return this.secrets.get(key) ?? null;
    }

    async delete(key: string): Promise<void> {
        this.secrets.delete(key);
    }

    async listKeys(): Promise<string[]> {
        return [...this.secrets.keys()].sort();
    }

    async exists(key: string): Promise<boolean> {
        return this.secrets.has(key);
    }

    async storeApiKey(profileId: string, apiKey: string): Promise<string> {
        const ref = apiKeyRef(profileId);
        await this.store(ref, apiKey);
        return ref;
    }

    async getApiKey(profileId: string): Promise<string | null> {
        return this.get(apiKeyRef(profileId));
    }

    async deleteApiKey(profileId: string): Promise<void> {
        await this.delete(apiKeyRef(profileId));
    }
}
