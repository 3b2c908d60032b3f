/**
 * @perch/core: Barrel Export
 */

export * from './events/event-bus.js';
export * from './bridge/channel.js';
export * from './bridge/view-command-sink.js';
export * from './bridge/user-event-forwarder.js';
export * from './bridge/ui-bridge.js';
export * from './presenters/index.js';
export * from './services/index.js';
export * from './services/memory/index.js';
export * from './app.js';
