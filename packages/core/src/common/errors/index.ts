export * from './error.type.js';
export * from './base.error.js';
export * from './rag.errors.js';
