/**
 * @perch/tui: Frame loop hook
 *
 * Ticks the FrameDriver on a fixed interval and re-renders only on
 * frames that changed something.
 */

import { useEffect, useState } from 'react';
import type { FrameDriver } from '../state/frame-driver.js';

/** Whatever can ring the driver between frames */
export interface WakeSource {
    setWakeListener(listener: (() => void) | null): void;
}

export function useFrameLoop(driver: FrameDriver, wakeSource: WakeSource, intervalMs: number): number {
    const [frame, setFrame] = useState(0);

    useEffect(() => {
        wakeSource.setWakeListener(() => driver.wake());

        const timer = setInterval(() => {
            if (driver.tick()) setFrame((n) => n + 1);
        }, intervalMs);

        return () => {
            clearInterval(timer);
            wakeSource.setWakeListener(null);
        };
    }, [driver, wakeSource, intervalMs]);

    return frame;
}
