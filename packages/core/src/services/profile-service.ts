/**
 * @perch/core: ProfileService contract
 */

import type { ConnectionTestResult, ModelProfile, NewProfile } from '@perch/shared';

export interface ProfileService {
    list(): Promise<ModelProfile[]>;
    get(id: string): Promise<ModelProfile>;
    create(profile: NewProfile): Promise<ModelProfile>;
    update(profile: ModelProfile): Promise<ModelProfile>;
    delete(id: string): Promise<void>;
    testConnection(id: string): Promise<ConnectionTestResult>;
    getDefault(): Promise<ModelProfile | null>;
    setDefault(id: string): Promise<void>;
}
