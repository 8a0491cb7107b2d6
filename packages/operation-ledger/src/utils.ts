import { nanoid } from "nanoid"

/**
 * Generates a unique ID using nanoid.
 */
export function generateID(): string {
  return nanoid()
}
