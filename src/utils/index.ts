/**
 * Barrel export for utility functions
 */

export * from './logger';
export * from './retry';
export * from './sanitize';
export * from './version';
