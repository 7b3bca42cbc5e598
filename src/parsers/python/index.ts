// Type definitions and constants
export * from './types';

// Module-scope traversal
export * from './traversal-utils';

// Import/Export extraction utilities
export * from './import-export-extractors';
