// Type definitions
export * from './types';

// Entry-point discovery
export * from './entry-point-locator';

// Per-module analysis and re-export resolution
export * from './module-analyzer';
export * from './reexport-resolver';

// Package-level orchestration
export * from './package-analyzer';
export * from './version-resolver';

// Report persistence and lookup
export * from './report-writer';
export * from './origin-index';
