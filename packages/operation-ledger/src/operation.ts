import { type EntityKey, entityKeysEqual, formatEntityKey } from "./entityKey"

/**
 * Net effect of a unit-of-work on one entity.
 * `staleVersion` means no version record must be persisted.
 */
export type OperationKind = "insert" | "update" | "delete" | "staleVersion"

/**
 * Raw lifecycle events reported by the lifecycle-tracking layer.
 */
export type LifecycleEvent = "insert" | "update" | "delete"

/**
 * The single operation recorded for an entity.
 */
export class Operation<Entity = unknown> {
  /**
   * Set by consumers once the operation has been emitted.
   * Never changed by the ledger itself.
   */
  processed = false

  constructor(
    readonly key: EntityKey,
    readonly kind: OperationKind,
    readonly target: Entity
  ) {}

  /**
   * Same key and kind. `processed` and the target object are ignored.
   */
  equals(other: Operation<unknown>): boolean {
    return this.kind === other.kind && entityKeysEqual(this.key, other.key)
  }

  /**
   * Copy of this operation stored under another key, keeping kind and `processed`.
   */
  withKey(key: EntityKey): Operation<Entity> {
    const moved = new Operation(key, this.kind, this.target)
    moved.processed = this.processed
    return moved
  }

  toString(): string {
    return `${this.kind} ${formatEntityKey(this.key)}`
  }
}

/**
 * An operation as handed to the persistence layer.
 */
export type FinalizedOperation<Entity> = {
  key: EntityKey
  kind: Exclude<OperationKind, "staleVersion">
  target: Entity
}
