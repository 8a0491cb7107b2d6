import { describe, expect, it } from "vitest"
import { type LifecycleEvent, mergeOperationKind, type OperationKind } from "../src/index"

const table: [OperationKind | undefined, LifecycleEvent, OperationKind][] = [
  [undefined, "insert", "insert"],
  [undefined, "update", "update"],
  [undefined, "delete", "delete"],
  ["insert", "insert", "insert"],
  ["insert", "update", "insert"],
  ["insert", "delete", "staleVersion"],
  ["update", "insert", "update"],
  ["update", "update", "update"],
  ["update", "delete", "delete"],
  ["delete", "insert", "update"],
  ["delete", "update", "delete"],
  ["delete", "delete", "delete"],
  ["staleVersion", "insert", "update"],
  ["staleVersion", "update", "update"],
  ["staleVersion", "delete", "delete"],
]

describe("mergeOperationKind", () => {
  it.each(table)("%s followed by %s gives %s", (existing, event, expected) => {
    expect(mergeOperationKind(existing, event)).toBe(expected)
  })
})
