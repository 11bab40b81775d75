// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Condition trees
export * from './conditions/index.js';

// Core components
export * from './core/index.js';

// Scenes
export * from './scenes/index.js';

// Rule scripts
export * from './scripting/index.js';

// Utils
export * from './utils/index.js';

// Persistence
export * from './persistence/index.js';

// Audit
export * from './audit/index.js';

// Configuration files
export * from './config/index.js';
