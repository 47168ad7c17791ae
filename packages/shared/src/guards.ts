/**
 * @file packages/shared/src/guards.ts
 * @description Small runtime type guards.
 */

/**
 * Determines whether the value is a plain (non-array) object.
 */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
