// Types
export * from './types/index.js';

// Zod schemas and schema registry
export * from './schemas/index.js';

// Validation (AJV)
export * from './validation/index.js';

// Error classes
export * from './errors.js';

// Pure utils (money, constants)
export * from './utils/index.js';
