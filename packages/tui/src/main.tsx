/**
 * @perch/tui: Entry Point
 *
 * Starts the core, then renders the App over its bridge. Leaving the
 * app (Ctrl+C) shuts the presenters and the bus down before exiting.
 */

import React from 'react';
import { render } from 'ink';
import { createApp } from '@perch/core';
import { createLogger } from '@perch/shared';
import { App } from './components/App.js';
import { FrameDriver } from './state/frame-driver.js';

const log = createLogger('Tui');

async function main(): Promise<void> {
    const app = await createApp();
    const driver = new FrameDriver(app.bridge.ui);

    const instance = render(
        React.createElement(App, {
            driver,
            wakeSource: app.bridge.ui,
            frameIntervalMs: app.config.frameIntervalMs,
        }),
    );

    await instance.waitUntilExit();
    await app.shutdown();
}

main().catch((err: unknown) => {
    log.error('Fatal', err);
    process.exitCode = 1;
});
