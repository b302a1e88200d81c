// src/core/types.ts

/**
 * @fileoverview
 * Central re-export of the descriptor model and generator configuration types.
 */
export * from './types/index.js';
