import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a random UUID
 */
export function generateUUID(): string {
  return uuidv4();
}
