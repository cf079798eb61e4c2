import { v7 as uuidv7 } from 'uuid';

/**
 * Generates a unique ID using UUID v7 (time-ordered).
 */
export function generateId(): string {
  return uuidv7();
}

