/**
 * Semantic Page Chunker - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Document models
export * from './document.js';

// Chunk models
export * from './chunk.js';

// Section models
export * from './section.js';
