export { CombineReducers, combineReducers } from "./combineReducers";
export { defineActions } from "./defineActions";
export { defineReducer, Reduce, type ReduceFunction } from "./defineReducer";
export { Effect, type EffectOperation } from "./Effect";
export { ActionValidationError, ReducerBodyError } from "./errors";
export { LoggedReducer, logActions } from "./logActions";
export { Reducer } from "./Reducer";
export { ValidatedReducer, validateActions } from "./validateActions";
export type {
  ActionOf,
  ActionSchema,
  ActionSchemaInput,
  BaseActionType,
  InferActionFromSchema,
  InferActionPayloadFromSchema,
  InferActionTypeFromSchema,
  InferFeatureNameFromSchema,
  Inout,
  ReducerOf,
  Reducible,
  StateOf,
} from "./types";
