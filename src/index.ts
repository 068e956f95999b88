// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Token scanning
export * from './scanner/index.js';

// Template store
export * from './store/index.js';

// Fillings
export * from './filling/index.js';

// Render policy
export * from './policy/index.js';

// Composition
export * from './engine/index.js';

// Loaders
export * from './loader/index.js';
