export type {
  ActionSchema,
  DefaultActionSchema,
  InferActionFromSchema,
  InferActionPayloadFromSchema,
  InferActionTypeFromSchema,
  InferFeatureNameFromSchema,
} from "./ActionSchema";
export type { ActionSchemaInput } from "./ActionSchemaInput";
export type { BaseActionType } from "./BaseActionType";
export type { Inout } from "./Inout";
export type { ActionOf, ReducerOf, StateOf } from "./ReducerOf";
export type { Reducible } from "./Reducible";
export type { ValueOf } from "./ValueOf";
