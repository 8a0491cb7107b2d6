import type { LifecycleEvent, OperationKind } from "./operation"

/**
 * Computes the operation to store for a key, given what is already recorded
 * (undefined if nothing) and the newly observed lifecycle event.
 *
 * | existing     | insert | update       | delete       |
 * |--------------|--------|--------------|--------------|
 * | (none)       | insert | update       | delete       |
 * | insert       | insert | insert       | staleVersion |
 * | update       | update | update       | delete       |
 * | delete       | update | delete       | delete       |
 * | staleVersion | update | update       | delete       |
 *
 * Total over all inputs, never throws.
 */
export function mergeOperationKind(
  existing: OperationKind | undefined,
  event: LifecycleEvent
): OperationKind {
  switch (event) {
    case "insert":
      if (existing === undefined || existing === "insert") return "insert"
      // identity already recorded in this unit-of-work: the row was modified
      return "update"

    case "update":
      // an entity created in this unit-of-work stays an insert
      if (existing === "insert") return "insert"
      if (existing === "delete") return "delete"
      return "update"

    case "delete":
      // never outlived the unit-of-work that created it
      if (existing === "insert") return "staleVersion"
      return "delete"
  }
}
