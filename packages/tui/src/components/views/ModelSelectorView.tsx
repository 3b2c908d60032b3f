/**
 * ModelSelectorView: search the models registry and pick one
 */

import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import SelectInput from 'ink-select-input';
import TextInput from 'ink-text-input';
import type { ModelInfo, ProviderInfo, UserEvent } from '@perch/shared';
import type { ViewState } from '../../state/view-state.js';

/** Provider filter after `current` in the list, with null (all providers) first */
export function cycleProvider(providers: readonly ProviderInfo[], current: string | null, step: 1 | -1): string | null {
    const options = [null, ...providers.map((p) => p.id)];
    const index = (options.indexOf(current) + step + options.length) % options.length;
    return options[index] ?? null;
}

function describeModel(model: ModelInfo): string {
    const traits = [
        `${Math.round(model.contextWindow / 1000)}k ctx`,
        model.supportsTools ? 'tools' : null,
        model.supportsReasoning ? 'reasoning' : null,
    ].filter((trait) => trait !== null);
    return `${model.name}  ${model.providerId}/${model.id}  (${traits.join(', ')})`;
}

// ─── Props ────────────────────────────────────────────────────────

export interface ModelSelectorViewProps {
    readonly models: ViewState['models'];
    readonly active: boolean;
    readonly send: (event: UserEvent) => void;
}

// ─── Component ────────────────────────────────────────────────────

export function ModelSelectorView({ models, active, send }: ModelSelectorViewProps): React.ReactElement {
    const [query, setQuery] = useState('');
    const [searching, setSearching] = useState(false);

    useInput((input, key) => {
        if (searching) return;
        if (input === '/') setSearching(true);
        if (key.leftArrow || key.rightArrow) {
            const providerId = cycleProvider(models.providers, models.providerId, key.rightArrow ? 1 : -1);
            send({ type: 'filter_models_by_provider', providerId });
        }
    }, { isActive: active });

    const provider = models.providers.find((p) => p.id === models.providerId);
    const items = models.results.map((model) => ({
        key: `${model.providerId}/${model.id}`,
        label: describeModel(model),
        value: model,
    }));

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} minHeight={10}>
            <Text bold color="cyan" underline>Select Model</Text>
            <Box gap={1}>
                <Text color="gray">Search:</Text>
                {searching ? (
                    <TextInput
                        value={query}
                        onChange={setQuery}
                        focus={active}
                        onSubmit={(text) => {
                            send({ type: 'search_models', query: text });
                            setSearching(false);
                        }}
                    />
                ) : (
                    <Text>{models.query || <Text color="gray" dimColor>all models</Text>}</Text>
                )}
                <Text color="magenta">‹ {provider?.name ?? 'all providers'} ›</Text>
            </Box>

            {items.length === 0 ? (
                <Text color="gray" italic>No models match.</Text>
            ) : (
                <SelectInput
                    items={items}
                    isFocused={active && !searching}
                    limit={10}
                    onSelect={(item) => send({ type: 'select_model', providerId: item.value.providerId, modelId: item.value.id })}
                />
            )}
            <Text color="gray" dimColor>Enter: select  •  /: search  •  ←/→: provider  •  Esc: back</Text>
        </Box>
    );
}
