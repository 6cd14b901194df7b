/**
 * Barrel export for all type definitions
 */

export * from './commit';
export * from './config';
export * from './issue';
export * from './policy';
export * from './ports';
export * from './pull-request';
