/**
 * @perch/shared: Barrel Export
 *
 * Single entry point for all shared types, constants, config and logging.
 */

export * from './constants.js';
export * from './errors.js';
export * from './types/domain.js';
export * from './types/view.js';
export * from './types/events.js';
export * from './types/view-command.js';
export * from './config/settings.js';
export * from './utils/logger.js';
