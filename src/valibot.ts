/**
 * @fileoverview Valibot schema provider for reducible.
 * This module provides the integration between the Valibot validation library and reducible's action schemas.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import * as v from "valibot";
import { standard } from "./standard";
import type { ActionSchemaInput, ValueOf } from "./types";

type ValibotEmptyObject = v.ObjectSchema<v.ObjectEntries, undefined>;

/**
 * Creates a Valibot schema provider for reducible.
 *
 * @typeParam $$FeatureName - The feature name type (inferred from `defineActions`)
 * @typeParam $$PayloadValibotDefinition - Object mapping action names to Valibot payload schemas
 * @typeParam $$NamespaceSeparator - Separator between feature name and action name (default: ":")
 *
 * @param args - Schema definition
 * @param args.action - Map of action names to Valibot object schemas defining action payloads
 * @param args.namespaceSeparator - Optional separator between feature name and action name (default: ":")
 *
 * @returns A schema provider function compatible with reducible's `ActionSchemaInput` interface
 *
 * @remarks
 * The provider wraps every payload schema into a `{ type, payload }` action schema whose
 * `type` is the namespaced action name, giving type-safe parsing through a discriminated union.
 *
 * @example
 * ```typescript
 * import { defineActions } from 'reducible';
 * import { valibot, v } from 'reducible/valibot';
 *
 * const todoActions = defineActions("todo", {
 *   schema: valibot({
 *     action: {
 *       added: v.object({
 *         id: v.string(),
 *         title: v.pipe(v.string(), v.minLength(1), v.maxLength(200)),
 *       }),
 *       toggled: v.object({ id: v.string() }),
 *       cleared: v.object({}),
 *     },
 *   }),
 * });
 *
 * todoActions.createAction("todo:toggled", { id: "1" });
 * ```
 *
 * @see {@link defineActions} for how to use this with an action schema definition
 * @see {@link ActionSchemaInput} for the schema provider interface
 */
export function valibot<
  $$FeatureName extends string,
  $$PayloadValibotDefinition extends {
    [actionName: string]: ValibotEmptyObject;
  },
  $$NamespaceSeparator extends string = ":",
>(args: {
  action: $$PayloadValibotDefinition;
  namespaceSeparator?: $$NamespaceSeparator;
}) {
  type $$ActionStandardDefinition = {
    [key in Extract<
      keyof $$PayloadValibotDefinition,
      string
    > as `${$$FeatureName}${$$NamespaceSeparator}${key}`]: StandardSchemaV1<
      unknown,
      {
        type: `${$$FeatureName}${$$NamespaceSeparator}${key}`;
        payload: v.InferOutput<$$PayloadValibotDefinition[key]>;
      }
    >;
  };
  type $$ActionType = StandardSchemaV1.InferOutput<
    ValueOf<$$ActionStandardDefinition>
  >;

  const input: ActionSchemaInput<$$FeatureName, $$ActionType> = (context) => {
    const namespaceSeparator = args.namespaceSeparator ?? ":";

    const action = Object.entries(args.action).reduce((acc, [key, payload]) => {
      const type = `${context.featureName}${namespaceSeparator}${key}`;
      const schema = v.object({
        type: v.literal(type),
        payload,
      });
      return {
        // biome-ignore lint/performance/noAccumulatingSpread: readonly acc
        ...acc,
        [type]: schema,
      };
    }, {} as $$ActionStandardDefinition);

    return standard<$$FeatureName, $$ActionStandardDefinition>({
      action,
    })(context);
  };

  return input;
}

export * as v from "valibot";
