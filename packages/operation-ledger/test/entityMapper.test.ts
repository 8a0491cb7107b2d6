import { describe, expect, it } from "vitest"
import { createSchemaMapper, isCollectionRelationship } from "../src/index"
import { article, createTestMapper } from "./fixtures/entities"

describe("createSchemaMapper", () => {
  it("reads type and current primary key", () => {
    const mapper = createTestMapper()
    const translation = { __type: "Translation", articleId: 7, locale: "en", text: "hello" }

    expect(mapper.entityTypeOf(translation)).toBe("Translation")
    expect(mapper.primaryKeyOf(translation)).toStrictEqual([7, "en"])
    expect(mapper.primaryKeyAttributes(translation)).toStrictEqual(["articleId", "locale"])
  })

  it("maps missing primary key values to null", () => {
    const mapper = createTestMapper()
    expect(mapper.primaryKeyOf({ __type: "Article" })).toStrictEqual([null])
  })

  it("rejects unsupported primary key values", () => {
    const mapper = createTestMapper()
    expect(() => mapper.primaryKeyOf({ __type: "Article", id: { nested: true } })).toThrow(
      'Primary key attribute "id" holds an unsupported value of type object'
    )
  })

  it("rejects unknown entity types", () => {
    const mapper = createTestMapper()
    expect(() => mapper.primaryKeyOf({ __type: "Ghost", id: 1 })).toThrow(
      'No schema registered for entity type "Ghost"'
    )
  })

  it("rejects entities without a type attribute", () => {
    const mapper = createSchemaMapper({ schemas: {} })
    expect(() => mapper.entityTypeOf({ id: 1 })).toThrow('Entity has no string "__type" attribute')
  })

  it("accepts a custom entityTypeOf", () => {
    const mapper = createSchemaMapper<{ kind: string; code: string }>({
      schemas: { Currency: { primaryKey: ["code"] } },
      entityTypeOf: (entity) => entity.kind,
    })
    expect(mapper.primaryKeyOf({ kind: "Currency", code: "EUR" })).toStrictEqual(["EUR"])
  })

  it("classifies relationships", () => {
    const mapper = createTestMapper()
    const entity = article(1)

    expect(mapper.relationshipDirection(entity, "tags")).toBe("manyToMany")
    expect(mapper.relationshipDirection(entity, "comments")).toBe("oneToMany")
    expect(mapper.relationshipDirection(entity, "author")).toBe("manyToOne")
    expect(mapper.relationshipDirection(entity, "title")).toBeUndefined()
  })

  it("tracks the persisted identity per entity", () => {
    const mapper = createTestMapper()
    const entity = article(1)
    expect(mapper.persistedPrimaryKeyOf(entity)).toBeUndefined()

    mapper.markPersisted(entity)
    entity.id = 2
    expect(mapper.persistedPrimaryKeyOf(entity)).toStrictEqual([1])
    expect(mapper.primaryKeyOf(entity)).toStrictEqual([2])

    mapper.markTransient(entity)
    expect(mapper.persistedPrimaryKeyOf(entity)).toBeUndefined()
  })
})

describe("isCollectionRelationship", () => {
  it("is true only for to-many directions", () => {
    expect(isCollectionRelationship("oneToMany")).toBe(true)
    expect(isCollectionRelationship("manyToMany")).toBe(true)
    expect(isCollectionRelationship("manyToOne")).toBe(false)
    expect(isCollectionRelationship(undefined)).toBe(false)
  })
})
