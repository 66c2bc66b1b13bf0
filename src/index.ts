export * from './interfaces/index.js';
export * from './models/index.js';
export { ConfigLoader, DEFAULT_CONFIG } from './config.js';
export { Utils } from './utils.js';
