/**
 * ProfileEditorView: create or edit a model profile
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import type { ProfileDraft, UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';
import { FieldList } from '../form/FieldList.js';
import type { Field } from '../form/FieldList.js';
import { profileFields, toProfileDraft, valuesOf, withValue } from './drafts.js';

// ─── Props ────────────────────────────────────────────────────────

export interface ProfileEditorViewProps {
    readonly editor: ViewState['profileEditor'];
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
    readonly onPickModel: (draft: ProfileDraft) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function ProfileEditorView({ editor, active, send, onPickModel }: ProfileEditorViewProps): React.ReactElement {
    const [fields, setFields] = useState<Field[]>([]);
    const [focused, setFocused] = useState(0);
    const draft = editor?.draft ?? null;

    // A freshly loaded draft replaces whatever was being typed
    useEffect(() => {
        if (!draft) return;
        setFields(profileFields(draft));
        setFocused(0);
    }, [draft]);

    useInput((input, key) => {
        if (editor && key.ctrl && input === 'l') onPickModel(toProfileDraft(valuesOf(fields), editor.draft.id));
    }, { isActive: active });

    if (!editor) {
        return <Text color="yellow">⏳ Loading profile...</Text>;
    }

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
            <Text bold color="cyan" underline>
                {editor.mode === 'create' ? 'New profile' : `Edit profile: ${editor.draft.name}`}
            </Text>
            <FieldList
                fields={fields}
                focused={focused}
                active={active}
                errors={editor.errors}
                onFocus={setFocused}
                onChange={(key, value) => setFields((prev) => withValue(prev, key, value))}
                onSubmit={() => send({ type: 'save_profile', draft: toProfileDraft(valuesOf(fields), editor.draft.id) })}
            />
            <Text color="gray" dimColor>↑/↓: field  •  Enter: next, save on the last field  •  Ctrl+L: pick model  •  Esc: cancel</Text>
        </Box>
    );
}
