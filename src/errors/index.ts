/**
 * Barrel export for all custom error classes
 */

export * from './configuration-error';
export * from './reconciliation-error';
export * from './tracker-request-error';
export * from './unconfigured-repository-error';
export * from './unknown-project-error';
export * from './verification-error';
