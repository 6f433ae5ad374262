// Re-export all schema tables
export * from './objects.js';
