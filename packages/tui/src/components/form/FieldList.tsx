/**
 * FieldList: keyboard-driven form used by the editor views
 *
 * ↑/↓ move between fields, Enter moves on and submits from the last
 * field. Only the focused field has a live text input.
 */

import React from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';

// ─── Types ────────────────────────────────────────────────────────

export interface Field {
    readonly key: string;
    readonly label: string;
    readonly value: string;
    /** Masked while typing, e.g. API keys */
    readonly secret?: boolean;
    readonly hint?: string;
}

// ─── Props ────────────────────────────────────────────────────────

export interface FieldListProps {
    readonly fields: readonly Field[];
    readonly focused: number;
    readonly active: boolean;
    readonly errors?: readonly string[];
    readonly onFocus: (index: number) => void;
    readonly onChange: (key: string, value: string) => void;
    readonly onSubmit: () => void;
}

// ─── Component ────────────────────────────────────────────────────

export function FieldList({ fields, focused, active, errors = [], onFocus, onChange, onSubmit }: FieldListProps): React.ReactElement {
    useInput((_input, key) => {
        if (key.upArrow) onFocus(Math.max(0, focused - 1));
        if (key.downArrow) onFocus(Math.min(fields.length - 1, focused + 1));
    }, { isActive: active });

    const advance = (): void => {
        if (focused >= fields.length - 1) onSubmit();
        else onFocus(focused + 1);
    };

    return (
        <Box flexDirection="column">
            {fields.map((field, i) => {
                const isFocused = active && i === focused;
                return (
                    <Box key={field.key} gap={1}>
                        <Text color={isFocused ? 'cyan' : 'gray'} bold={isFocused}>
                            {isFocused ? '›' : ' '} {field.label.padEnd(14)}
                        </Text>
                        {isFocused ? (
                            <TextInput
                                value={field.value}
                                onChange={(value) => onChange(field.key, value)}
                                onSubmit={advance}
                                mask={field.secret ? '*' : undefined}
                                placeholder={field.hint}
                            />
                        ) : (
                            <Text>{field.secret && field.value ? '*'.repeat(field.value.length) : field.value || <Text color="gray" dimColor>{field.hint ?? ''}</Text>}</Text>
                        )}
                    </Box>
                );
            })}

            {errors.map((error, i) => (
                <Text key={i} color="red">✖ {error}</Text>
            ))}
        </Box>
    );
}
