/**
 * @dockhand/shared - Shared Types, Schemas, Constants, Config & Errors
 */

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';

// Constants
export * from './constants/index.js';

// Config
export * from './config/index.js';

// Errors
export * from './errors/index.js';
