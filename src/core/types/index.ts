export * from './config.js';
export * from './descriptor.js';
