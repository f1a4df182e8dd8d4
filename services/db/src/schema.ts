export * from './models/document.js';
export * from './models/chunk.js';
