import { nanoid } from "nanoid";

/**
 * ID generation for documents and hook contexts.
 *
 * Uses nanoid: URL-safe, 21 characters by default.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;
