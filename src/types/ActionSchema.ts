import type { ActionSchemaInput } from "./ActionSchemaInput";
import type { BaseActionType } from "./BaseActionType";

/**
 * Type definition for a complete action schema.
 * @internal
 */
export type ActionSchema<
  FeatureName,
  ActionType extends BaseActionType,
> = ReturnType<ActionSchemaInput<FeatureName, ActionType>> & {
  createAction<K extends ActionType["type"]>(
    type: K,
    payload: Extract<ActionType, { type: K }>["payload"],
  ): Extract<ActionType, { type: K }>;
  " $$featureName": FeatureName;
};

/**
 * Infer the action type from an action schema.
 * @internal
 */
export type InferActionFromSchema<T> = T extends {
  parseAction: (input: unknown) => infer Action;
}
  ? Action
  : never;

/**
 * Infer the action type names from an action schema.
 * @internal
 */
export type InferActionTypeFromSchema<T> =
  InferActionFromSchema<T> extends { type: infer Type } ? Type : string;

/**
 * Infer the payload of one action from an action schema.
 * @internal
 */
export type InferActionPayloadFromSchema<T, K> = InferActionFromSchema<T> extends infer Action
  ? Action extends { type: K; payload: infer Payload }
    ? Payload
    : never
  : never;

/**
 * Infer the feature name from an action schema.
 * @internal
 */
export type InferFeatureNameFromSchema<T> = T extends {
  " $$featureName": infer FeatureName;
}
  ? FeatureName
  : never;

/**
 * Default action schema type
 * @internal
 */
export type DefaultActionSchema = ActionSchema<string, BaseActionType>;
