import type { ActionSchema, ActionSchemaInput, BaseActionType } from "./types";

/**
 * Defines the actions of a feature with pluggable validation.
 *
 * @param featureName - The name used to namespace action types (e.g., "counter", "todo")
 * @param options - Schema configuration options
 * @param options.schema - Schema provider function (e.g., `valibot()`) that provides validation
 *
 * @returns A fully-typed action schema for use with `defineReducer()` and `validateActions()`
 *
 * @remarks
 * Actions described by a schema have the shape `{ type, payload }`, where `type` is
 * namespaced with the feature name (e.g., `counter:added`). The schema types
 * reducers through `defineReducer(actions, fn)` and validates actions arriving
 * from untyped sources through `validateActions()`.
 *
 * @example
 * ```typescript
 * import { defineActions } from 'reducible';
 * import { valibot, v } from 'reducible/valibot';
 *
 * const counterActions = defineActions("counter", {
 *   schema: valibot({
 *     action: {
 *       added: v.object({ amount: v.number() }),
 *       reset: v.object({}),
 *     },
 *   }),
 * });
 *
 * const action = counterActions.createAction("counter:added", { amount: 2 });
 * // { type: "counter:added", payload: { amount: 2 } }
 * ```
 */
export function defineActions<
  $$FeatureName extends string,
  $$ActionType extends BaseActionType,
>(
  featureName: $$FeatureName,
  options: {
    schema: ActionSchemaInput<$$FeatureName, $$ActionType>;
  },
): ActionSchema<$$FeatureName, $$ActionType> {
  const { actionTypes, parseAction, parseActionByType } = options.schema({
    featureName,
  });

  return {
    actionTypes,
    parseAction,
    parseActionByType,
    createAction(type, payload) {
      return parseActionByType(type, { type, payload });
    },
    " $$featureName": featureName,
  };
}
