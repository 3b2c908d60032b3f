/**
 * @perch/core: SecretsService contract
 */

export interface SecretsService {
    store(key: string, value: string): Promise<void>;
    get(key: string): Promise<string | null>;
    delete(key: string): Promise<void>;
    listKeys(): Promise<string[]>;
    exists(key: string): Promise<boolean>;
    storeApiKey(profileId: string, apiKey: string): Promise<string>;
    getApiKey(profileId: string): Promise<string | null>;
    deleteApiKey(profileId: string): Promise<void>;
}

/** Secret key under which a profile's API key lives */
export function apiKeyRef(profileId: string): string {
    return `api_key:${profileId}`;
}
