import { freeze } from "immer"

/**
 * A single primary-key column value.
 * Keys are opaque: `null` components are accepted and compared like any other value.
 */
export type PrimaryKeyValue = string | number | bigint | boolean | Date | null

/**
 * Identity of an entity within a unit-of-work (Composite Key).
 */
export type EntityKey = {
  readonly entityType: string
  readonly primaryKey: readonly PrimaryKeyValue[]
}

/**
 * Canonical string form of an EntityKey, used as the ledger's map key.
 */
export type EntityKeyString = string

/**
 * Creates a frozen EntityKey.
 * The primary key array is copied, so later mutation of the caller's array has no effect.
 */
export function createEntityKey(
  entityType: string,
  primaryKey: readonly PrimaryKeyValue[]
): EntityKey {
  return freeze({ entityType, primaryKey: [...primaryKey] }, true)
}

function encodePrimaryKeyValue(value: PrimaryKeyValue): string {
  if (value === null) return "z"
  if (value instanceof Date) return `d:${value.getTime()}`
  if (typeof value === "string") return `s:${value}`
  if (typeof value === "number") return `n:${value}`
  if (typeof value === "bigint") return `i:${value}`
  return value ? "b:1" : "b:0"
}

/**
 * Converts an EntityKey to its canonical string.
 * Values of different types never collide (`1` and `"1"` map to different strings).
 */
export function entityKeyToString(key: EntityKey): EntityKeyString {
  return JSON.stringify([key.entityType, ...key.primaryKey.map(encodePrimaryKeyValue)])
}

/**
 * Value equality of two keys: same type and element-wise equal primary keys.
 * Agrees with the canonical string, so two invalid Dates are equal.
 */
export function entityKeysEqual(a: EntityKey, b: EntityKey): boolean {
  return entityKeyToString(a) === entityKeyToString(b)
}

function formatPrimaryKeyValue(value: PrimaryKeyValue): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  }
  if (typeof value === "string") return JSON.stringify(value)
  return String(value)
}

/**
 * Human readable form, e.g. `Article[1,"en"]`.
 */
export function formatEntityKey(key: EntityKey): string {
  return `${key.entityType}[${key.primaryKey.map(formatPrimaryKeyValue).join(",")}]`
}
