/**
 * @module uuid
 * UUID v4 generation for layers, compositions and edit sessions.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generates a UUID v4 string.
 *
 * @returns A new UUID v4 string (e.g. "550e8400-e29b-41d4-a716-446655440000").
 */
export function generateId(): string {
  return randomUUID();
}
