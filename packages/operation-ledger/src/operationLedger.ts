import {
  createEntityKey,
  type EntityKey,
  type EntityKeyString,
  entityKeyToString,
} from "./entityKey"
import { type EntityMapper, isCollectionRelationship } from "./entityMapper"
import { EntityKeyNotFoundError, failure } from "./error"
import { mergeOperationKind } from "./mergeOperation"
import {
  type FinalizedOperation,
  type LifecycleEvent,
  Operation,
  type OperationKind,
} from "./operation"
import { generateID } from "./utils"

export interface OperationLedgerOptions<Entity> {
  /**
   * Introspection of the tracked entities (type, primary key, relationships).
   */
  mapper: EntityMapper<Entity>

  /**
   * Identifier of the unit-of-work this ledger belongs to.
   * If omitted, a random ID (nanoid) will be generated.
   */
  transactionId?: string
}

/**
 * A change made to the ledger by one of the record* calls.
 */
export type LedgerChange<Entity> = {
  event: LifecycleEvent
  key: EntityKey
  previous: OperationKind | undefined
  current: OperationKind
  target: Entity
  /**
   * Set when the entry was moved from the entity's persisted identity first.
   */
  rekeyedFrom?: EntityKey
}

export interface OperationLedger<Entity> extends Iterable<[EntityKey, Operation<Entity>]> {
  readonly transactionId: string

  /**
   * Number of recorded operations, stale ones included.
   */
  readonly size: number

  /**
   * Key of an entity, computed from its current primary-key values.
   */
  keyOf(entity: Entity): EntityKey

  /**
   * Records that the entity was newly created.
   */
  recordInsert(entity: Entity): Operation<Entity>

  /**
   * Records that the entity was modified.
   * Changes to one-to-many and many-to-many relationships are ignored; if nothing
   * else changed the ledger is left untouched and undefined is returned.
   */
  recordUpdate(entity: Entity, changedAttributes: Iterable<string>): Operation<Entity> | undefined

  /**
   * Records that the entity was removed.
   */
  recordDelete(entity: Entity): Operation<Entity>

  /**
   * Moves the entry recorded under the entity's persisted identity to its current key,
   * if a primary-key attribute is among the changed attributes.
   * The moved entry goes to the end of the iteration order.
   *
   * @returns true if an entry was moved.
   */
  rekey(entity: Entity, changedAttributes: Iterable<string>): boolean

  has(key: EntityKey): boolean
  hasEntity(entity: Entity): boolean
  get(key: EntityKey): Operation<Entity> | undefined
  set(key: EntityKey, operation: Operation<Entity>): void

  /**
   * Stores an operation under its own key.
   */
  add(operation: Operation<Entity>): void

  /**
   * Removes the entry for a key.
   * Throws EntityKeyNotFoundError if there is none.
   */
  delete(key: EntityKey): void

  isEmpty(): boolean
  entries(): IterableIterator<[EntityKey, Operation<Entity>]>
  keys(): IterableIterator<EntityKey>
  values(): IterableIterator<Operation<Entity>>

  /**
   * Operations to persist, in ledger order. Stale versions are left out.
   */
  finalizedOperations(): FinalizedOperation<Entity>[]

  /**
   * Distinct entity types with at least one operation to persist.
   */
  changedEntityTypes(): ReadonlySet<string>

  /**
   * Subscribes to ledger changes made by the record* calls.
   */
  subscribe(listener: (change: LedgerChange<Entity>) => void): () => void

  /**
   * Discards all entries and listeners. The ledger cannot be used afterwards.
   */
  dispose(): void
}

/**
 * Creates the operation ledger of a single unit-of-work.
 */
export function createOperationLedger<Entity>(
  options: OperationLedgerOptions<Entity>
): OperationLedger<Entity> {
  const { mapper, transactionId = generateID() } = options

  if (transactionId.length === 0) {
    failure("transactionId must not be empty")
  }

  // insertion ordered; Map.set on an existing key keeps its position
  const entriesByKey = new Map<EntityKeyString, [EntityKey, Operation<Entity>]>()
  const listeners = new Set<(change: LedgerChange<Entity>) => void>()

  let disposed = false

  const assertNotDisposed = () => {
    if (disposed) {
      failure(`OperationLedger ${transactionId} has been disposed and cannot be used`)
    }
  }

  const notifyListeners = (change: LedgerChange<Entity>) => {
    for (const listener of listeners) {
      listener(change)
    }
  }

  const keyOf = (entity: Entity): EntityKey =>
    createEntityKey(mapper.entityTypeOf(entity), mapper.primaryKeyOf(entity))

  const getOperation = (key: EntityKey) => entriesByKey.get(entityKeyToString(key))?.[1]

  const setOperation = (key: EntityKey, operation: Operation<Entity>) => {
    entriesByKey.set(entityKeyToString(key), [key, operation])
  }

  // returns the key the entry was moved from, if any
  const rekeyEntity = (entity: Entity, changed: ReadonlySet<string>): EntityKey | undefined => {
    const primaryKeyChanged = mapper
      .primaryKeyAttributes(entity)
      .some((attribute) => changed.has(attribute))
    if (!primaryKeyChanged) return undefined

    const persistedPrimaryKey = mapper.persistedPrimaryKeyOf(entity)
    if (!persistedPrimaryKey) return undefined

    const oldKey = createEntityKey(mapper.entityTypeOf(entity), persistedPrimaryKey)
    const oldKeyString = entityKeyToString(oldKey)
    const entry = entriesByKey.get(oldKeyString)
    if (!entry) return undefined

    const newKey = keyOf(entity)
    entriesByKey.delete(oldKeyString)
    // an entry already under the new key is replaced, and the moved one goes last
    entriesByKey.delete(entityKeyToString(newKey))
    setOperation(newKey, entry[1].withKey(newKey))
    return oldKey
  }

  const record = (
    event: LifecycleEvent,
    entity: Entity,
    rekeyedFrom?: EntityKey
  ): Operation<Entity> => {
    const key = keyOf(entity)
    const previous = getOperation(key)?.kind
    const operation = new Operation(key, mergeOperationKind(previous, event), entity)
    setOperation(key, operation)

    notifyListeners({
      event,
      key,
      previous,
      current: operation.kind,
      target: entity,
      ...(rekeyedFrom ? { rekeyedFrom } : {}),
    })
    return operation
  }

  function* entries(): IterableIterator<[EntityKey, Operation<Entity>]> {
    for (const [key, operation] of entriesByKey.values()) {
      yield [key, operation]
    }
  }

  function* keys(): IterableIterator<EntityKey> {
    for (const [key] of entriesByKey.values()) {
      yield key
    }
  }

  function* values(): IterableIterator<Operation<Entity>> {
    for (const [, operation] of entriesByKey.values()) {
      yield operation
    }
  }

  return {
    transactionId,

    get size() {
      assertNotDisposed()
      return entriesByKey.size
    },

    keyOf(entity) {
      assertNotDisposed()
      return keyOf(entity)
    },

    recordInsert(entity) {
      assertNotDisposed()
      return record("insert", entity)
    },

    recordUpdate(entity, changedAttributes) {
      assertNotDisposed()
      const changed = new Set<string>()
      for (const attribute of changedAttributes) {
        // collection changes are recorded on the other side of the relationship
        if (!isCollectionRelationship(mapper.relationshipDirection(entity, attribute))) {
          changed.add(attribute)
        }
      }
      if (changed.size === 0) return undefined

      const rekeyedFrom = rekeyEntity(entity, changed)
      return record("update", entity, rekeyedFrom)
    },

    recordDelete(entity) {
      assertNotDisposed()
      return record("delete", entity)
    },

    rekey(entity, changedAttributes) {
      assertNotDisposed()
      return rekeyEntity(entity, new Set(changedAttributes)) !== undefined
    },

    has(key) {
      assertNotDisposed()
      return entriesByKey.has(entityKeyToString(key))
    },

    hasEntity(entity) {
      assertNotDisposed()
      return entriesByKey.has(entityKeyToString(keyOf(entity)))
    },

    get(key) {
      assertNotDisposed()
      return getOperation(key)
    },

    set(key, operation) {
      assertNotDisposed()
      setOperation(key, operation)
    },

    add(operation) {
      assertNotDisposed()
      setOperation(operation.key, operation)
    },

    delete(key) {
      assertNotDisposed()
      if (!entriesByKey.delete(entityKeyToString(key))) {
        throw new EntityKeyNotFoundError(key)
      }
    },

    isEmpty() {
      assertNotDisposed()
      return entriesByKey.size === 0
    },

    entries() {
      assertNotDisposed()
      return entries()
    },

    keys() {
      assertNotDisposed()
      return keys()
    },

    values() {
      assertNotDisposed()
      return values()
    },

    [Symbol.iterator]() {
      assertNotDisposed()
      return entries()
    },

    finalizedOperations() {
      assertNotDisposed()
      const result: FinalizedOperation<Entity>[] = []
      for (const [key, operation] of entriesByKey.values()) {
        if (operation.kind === "staleVersion") continue
        result.push({ key, kind: operation.kind, target: operation.target })
      }
      return result
    },

    changedEntityTypes() {
      assertNotDisposed()
      const types = new Set<string>()
      for (const [key, operation] of entriesByKey.values()) {
        if (operation.kind !== "staleVersion") {
          types.add(key.entityType)
        }
      }
      return types
    },

    subscribe(listener) {
      assertNotDisposed()
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },

    dispose() {
      if (disposed) return // Already disposed, no-op
      disposed = true
      entriesByKey.clear()
      listeners.clear()
    },
  }
}
