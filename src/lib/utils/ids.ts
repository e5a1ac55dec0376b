import { v7 as uuidv7 } from 'uuid';

/**
 * Generates a unique ID using UUID v7 (time-ordered).
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Validate UUIDv7 format
 */
export function isValidUUIDv7(id: string): boolean {
  const uuidv7Pattern = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  return uuidv7Pattern.test(id);
}
