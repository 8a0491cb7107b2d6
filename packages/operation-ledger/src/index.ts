export {
  createEntityKey,
  type EntityKey,
  type EntityKeyString,
  entityKeysEqual,
  entityKeyToString,
  formatEntityKey,
  type PrimaryKeyValue,
} from "./entityKey"
export {
  createSchemaMapper,
  type EntityMapper,
  type EntityRecord,
  type EntitySchema,
  isCollectionRelationship,
  type RelationshipDirection,
  type SchemaMapper,
  type SchemaMapperOptions,
} from "./entityMapper"
export { EntityKeyNotFoundError, OperationLedgerError } from "./error"
export { mergeOperationKind } from "./mergeOperation"
export {
  type FinalizedOperation,
  type LifecycleEvent,
  Operation,
  type OperationKind,
} from "./operation"
export {
  createOperationLedger,
  type LedgerChange,
  type OperationLedger,
  type OperationLedgerOptions,
} from "./operationLedger"
