export {
  type AnyFieldBuilder,
  ArrayFieldBuilder,
  BooleanFieldBuilder,
  EnumFieldBuilder,
  FieldBuilder,
  field,
  JsonFieldBuilder,
  MapFieldBuilder,
  NumberFieldBuilder,
  ObjectFieldBuilder,
  StringFieldBuilder,
} from './fieldBuilders'
export { defineState, type FieldInfo, type FieldScope, StateDef } from './StateDef'
export type {
  FieldDef,
  FieldType,
  InferFieldType,
  InferState,
  PolicyKind,
  ReplicationPolicy,
  StateSchema,
} from './types'
