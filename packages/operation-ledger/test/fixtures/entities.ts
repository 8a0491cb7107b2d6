import { createSchemaMapper, type EntityRecord } from "../../src/index"

export type TestEntity = EntityRecord & { __type: string }

export const createTestMapper = () =>
  createSchemaMapper<TestEntity>({
    schemas: {
      Article: {
        primaryKey: ["id"],
        relationships: { tags: "manyToMany", comments: "oneToMany", author: "manyToOne" },
      },
      Translation: { primaryKey: ["articleId", "locale"] },
      Tag: { primaryKey: ["name"] },
    },
  })

export const article = (id: number, title = `article ${id}`): TestEntity => ({
  __type: "Article",
  id,
  title,
})
