/**
 * @file packages/shared/src/index.ts
 * @description Public entry point of the shared package.
 */

export * from './types.js';
export * from './protocol.js';
export * from './constants.js';
export * from './guards.js';
