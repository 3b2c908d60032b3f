/**
 * ErrorBanner: the one error currently on screen
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ErrorSeverity } from '@perch/shared';
import type { ViewState } from '../state/view-state.js';

const SEVERITY_COLOR: Record<ErrorSeverity, string> = {
    info: 'cyan',
    warning: 'yellow',
    error: 'red',
    critical: 'redBright',
};

export function ErrorBanner({ error }: { error: ViewState['error'] }): React.ReactElement | null {
    if (!error) return null;
    const color = SEVERITY_COLOR[error.severity];

    return (
        <Box borderStyle="round" borderColor={color} paddingX={1} flexDirection="column">
            <Text bold color={color}>
                {error.severity === 'critical' ? '🔴' : '❌'} {error.title}
            </Text>
            <Text wrap="wrap">{error.message}</Text>
            <Text color="gray" dimColor>Esc: dismiss</Text>
        </Box>
    );
}
