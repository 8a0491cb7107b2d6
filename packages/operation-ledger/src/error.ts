import type { EntityKey } from "./entityKey"
import { formatEntityKey } from "./entityKey"

export class OperationLedgerError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, OperationLedgerError.prototype)
  }
}

/**
 * Thrown when an entry is removed by a key the ledger does not hold.
 */
export class EntityKeyNotFoundError extends OperationLedgerError {
  constructor(readonly key: EntityKey) {
    super(`No operation recorded for ${formatEntityKey(key)}`)

    Object.setPrototypeOf(this, EntityKeyNotFoundError.prototype)
  }
}

export function failure(message: string): never {
  throw new OperationLedgerError(message)
}
