export * from './config.js';
export * from './flag-identifier.js';
export * from './mask-like.js';
export * from './permission-store.js';
