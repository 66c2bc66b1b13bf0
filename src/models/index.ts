export * from './permission-store.js';
