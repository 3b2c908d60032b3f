/**
 * @perch/core: Profile Editor Presenter
 *
 * Create and edit model profiles. Drafts are validated here before the
 * ProfileService sees them; API keys go to the SecretsService and only a
 * reference is kept on the profile.
 */

import { AppEvents, ProfileDraftSchema, blankProfileDraft, formatIssues, profileToDraft } from '@perch/shared';
import type { AppEvent, ModelProfile, NewProfile, ProfileDraft, ProfileEvent, UserEvent, ValidProfileDraft } from '@perch/shared';
import type { ProfileService, SecretsService } from '../services/index.js';
import { Presenter } from './presenter.js';
import type { PresenterContext } from './presenter.js';

export interface ProfileEditorServices {
    readonly profiles: ProfileService;
    readonly secrets: SecretsService;
}

function toNewProfile(draft: ValidProfileDraft): NewProfile {
    return {
        name: draft.name,
        providerId: draft.providerId,
        modelId: draft.modelId,
        baseUrl: draft.baseUrl,
        systemPrompt: draft.systemPrompt,
        parameters: {
            temperature: draft.temperature,
            maxTokens: draft.maxTokens,
            thinkingEnabled: draft.thinkingEnabled,
        },
    };
}

export class ProfileEditorPresenter extends Presenter {
    private readonly profiles: ProfileService;
    private readonly secrets: SecretsService;

    constructor(context: PresenterContext, services: ProfileEditorServices) {
        super('ProfileEditorPresenter', context);
        this.profiles = services.profiles;
        this.secrets = services.secrets;
    }

    protected async dispatch(event: AppEvent): Promise<void> {
        if (event.type === 'user') return this.onUser(event.payload);
        if (event.type === 'profile') return this.onProfile(event.payload);
    }

    private async onUser(event: UserEvent): Promise<void> {
        switch (event.type) {
            case 'create_profile':
                this.emit({ type: 'profile_editor_loaded', mode: 'create', draft: blankProfileDraft() });
                this.navigateTo('profile_editor');
                return;

            case 'edit_profile': {
                const loaded = await this.attempt('Profile Error', () => this.profiles.get(event.id));
                if (!loaded.ok) return;
                this.emit({ type: 'profile_editor_loaded', mode: 'edit', draft: profileToDraft(loaded.value) });
                this.navigateTo('profile_editor');
                return;
            }

            case 'save_profile':
                return this.save(event.draft);

            case 'test_profile_connection': {
                // test_started / test_completed arrive as profile events
                const tested = await this.attempt('Connection Test Failed', () => this.profiles.testConnection(event.id), 'warning');
                if (tested.ok && !tested.value.success) {
                    this.showError('Connection Test Failed', tested.value.error ?? 'The provider did not respond', 'warning');
                }
                return;
            }

            default:
                return;
        }
    }

    private async save(draft: ProfileDraft): Promise<void> {
        const parsed = ProfileDraftSchema.safeParse(draft);
        if (!parsed.success) {
            const errors = formatIssues(parsed.error);
            this.emit({ type: 'profile_validation_failed', errors });
            this.publish(AppEvents.profile({ type: 'validation_failed', id: draft.id ?? null, errors }));
            return;
        }

        const valid = parsed.data;
        const saved = await this.attempt('Save Failed', () => this.persist(valid));
        if (!saved.ok) return;

        this.emit({ type: 'profile_saved', id: saved.value.id });
        this.navigateBack();
    }

    private async persist(draft: ValidProfileDraft): Promise<ModelProfile> {
        const fields = toNewProfile(draft);
        let profile = draft.id
            ? await this.profiles.update({ ...(await this.profiles.get(draft.id)), ...fields })
            : await this.profiles.create(fields);

        const apiKey = draft.apiKey?.trim();
        if (apiKey) {
            const ref = await this.secrets.storeApiKey(profile.id, apiKey);
            if (profile.apiKeyRef !== ref) {
                profile = await this.profiles.update({ ...profile, apiKeyRef: ref });
            }
        }
        return profile;
    }

    private async onProfile(event: ProfileEvent): Promise<void> {
        switch (event.type) {
            case 'test_started':
                this.emit({ type: 'profile_test_started', id: event.id });
                return;
            case 'test_completed':
                this.emit({
                    type: 'profile_test_completed',
                    id: event.id,
                    success: event.success,
                    responseTimeMs: event.responseTimeMs,
                    error: event.error,
                });
                return;
            case 'deleted':
                await this.attempt('Profile Error', () => this.secrets.deleteApiKey(event.id), 'warning');
                return;
            default:
                return;
        }
    }
}
