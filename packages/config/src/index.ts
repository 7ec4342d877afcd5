export * from './env.js';
export * from './storage-env.js';
