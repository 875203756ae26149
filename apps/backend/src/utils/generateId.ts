import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique identifier (UUID v4) for entities, milestones and
 * comments.
 */
export function generateId(): string {
  return uuidv4();
}
