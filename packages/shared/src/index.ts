// Table and column metadata
export * from './types/schema.js';

// Row source contracts
export * from './types/rows.js';

// Identifier helpers
export * from './utils/identifier.js';

// Logging
export * from './utils/logger.js';
