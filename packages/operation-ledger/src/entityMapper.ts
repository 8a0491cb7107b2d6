import type { PrimaryKeyValue } from "./entityKey"
import { failure } from "./error"

/**
 * Direction of a relationship attribute, seen from the entity that owns it.
 */
export type RelationshipDirection = "manyToOne" | "oneToMany" | "manyToMany"

/**
 * Introspection capabilities the ledger needs from the lifecycle-tracking layer.
 * Implementations MUST be pure: the ledger may call them any number of times.
 */
export interface EntityMapper<Entity> {
  /**
   * Name of the entity's type. Must not be empty.
   */
  entityTypeOf(entity: Entity): string

  /**
   * Current primary-key values, read from the entity's attributes.
   * Must work for entities that have never been persisted.
   */
  primaryKeyOf(entity: Entity): readonly PrimaryKeyValue[]

  /**
   * Primary-key values the entity was last persisted with,
   * or undefined if it has no persisted identity yet.
   */
  persistedPrimaryKeyOf(entity: Entity): readonly PrimaryKeyValue[] | undefined

  /**
   * Attribute names that make up the primary key.
   */
  primaryKeyAttributes(entity: Entity): readonly string[]

  /**
   * Relationship direction of an attribute, or undefined for scalar attributes.
   */
  relationshipDirection(entity: Entity, attribute: string): RelationshipDirection | undefined
}

/**
 * True for relationships whose changes are recorded on the other side
 * (one-to-many and many-to-many collections).
 */
export function isCollectionRelationship(direction: RelationshipDirection | undefined): boolean {
  return direction === "oneToMany" || direction === "manyToMany"
}

/**
 * Describes one entity type for `createSchemaMapper`.
 */
export interface EntitySchema {
  primaryKey: readonly string[]
  relationships?: Readonly<Record<string, RelationshipDirection>>
}

export type EntityRecord = Record<string, unknown>

export interface SchemaMapperOptions<Entity extends EntityRecord> {
  /**
   * Schemas by entity type name.
   */
  schemas: Readonly<Record<string, EntitySchema>>

  /**
   * Resolves the type name of an entity.
   * Default: the `__type` attribute.
   */
  entityTypeOf?: (entity: Entity) => string
}

export interface SchemaMapper<Entity extends EntityRecord> extends EntityMapper<Entity> {
  /**
   * Remembers the entity's current primary key as its persisted identity.
   * Call after the entity has been loaded or flushed.
   */
  markPersisted(entity: Entity): void

  /**
   * Forgets the entity's persisted identity (e.g. after it was deleted and flushed).
   */
  markTransient(entity: Entity): void
}

function toPrimaryKeyValue(value: unknown, attribute: string): PrimaryKeyValue {
  if (value === undefined || value === null) return null
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value
  }
  failure(`Primary key attribute "${attribute}" holds an unsupported value of type ${typeof value}`)
}

/**
 * Creates an EntityMapper for plain-object entities described by per-type schemas.
 * Persisted identities are tracked per entity object.
 */
export function createSchemaMapper<Entity extends EntityRecord>(
  options: SchemaMapperOptions<Entity>
): SchemaMapper<Entity> {
  const {
    schemas,
    entityTypeOf = (entity: Entity) => {
      const type = entity.__type
      if (typeof type !== "string") {
        failure(`Entity has no string "__type" attribute`)
      }
      return type
    },
  } = options

  const persisted = new WeakMap<Entity, readonly PrimaryKeyValue[]>()

  const schemaOf = (entity: Entity): EntitySchema => {
    const type = entityTypeOf(entity)
    const schema = schemas[type]
    if (!schema) {
      failure(`No schema registered for entity type "${type}"`)
    }
    return schema
  }

  const primaryKeyOf = (entity: Entity): readonly PrimaryKeyValue[] =>
    schemaOf(entity).primaryKey.map((attribute) => toPrimaryKeyValue(entity[attribute], attribute))

  return {
    entityTypeOf,
    primaryKeyOf,

    persistedPrimaryKeyOf(entity) {
      return persisted.get(entity)
    },

    primaryKeyAttributes(entity) {
      return schemaOf(entity).primaryKey
    },

    relationshipDirection(entity, attribute) {
      return schemaOf(entity).relationships?.[attribute]
    },

    markPersisted(entity) {
      persisted.set(entity, primaryKeyOf(entity))
    },

    markTransient(entity) {
      persisted.delete(entity)
    },
  }
}
