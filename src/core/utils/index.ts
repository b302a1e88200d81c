// Re-export everything from sub-modules
export * from './string.js';
export * from './naming.js';
export * from './module-specifier.js';
