import { randomUUID } from 'node:crypto';

/**
 * Generates a unique identifier, optionally prefixed ("cond-…", "timer-…").
 */
export function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}-${id}` : id;
}
