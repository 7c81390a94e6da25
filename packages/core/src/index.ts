/**
 * @neowatch/core
 *
 * Entity model, temporal normalizer and linkage step for near-Earth object feeds
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Date-time handling
export * from './time/index.js';

// Validation schemas
export * from './validation/index.js';

// Entities and linkage
export * from './models/index.js';
