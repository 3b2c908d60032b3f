/**
 * NotificationLog: compact panel of recent notifications
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { NotificationLevel } from '@perch/shared';
import type { ViewState } from '../state/view-state.js';

const LEVEL_STYLE: Record<NotificationLevel, { icon: string; color: string }> = {
    info: { icon: 'ℹ', color: 'white' },
    success: { icon: '✅', color: 'green' },
    warning: { icon: '⚠️', color: 'yellow' },
};

// ─── Props ────────────────────────────────────────────────────────

export interface NotificationLogProps {
    readonly notifications: ViewState['notifications'];
    /** Number of recent entries to display */
    readonly displayCount?: number;
}

// ─── Component ────────────────────────────────────────────────────

export function NotificationLog({ notifications, displayCount = 5 }: NotificationLogProps): React.ReactElement | null {
    if (notifications.length === 0) return null;
    const visible = notifications.slice(-displayCount);

    return (
        <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
            <Text bold color="gray" underline>Notifications</Text>
            {visible.map((entry, i) => {
                const style = LEVEL_STYLE[entry.level];
                return (
                    <Text key={i} color={style.color} dimColor>{style.icon} {entry.message}</Text>
                );
            })}
        </Box>
    );
}
