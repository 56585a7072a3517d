// Zod schemas and record contracts
export * from './schemas/index.js';

// Extractor contract
export * from './extractor/index.js';

// Rewindable input streams
export * from './io/index.js';

// Pure utils (date, decimal, import id, constants)
export * from './utils/index.js';
