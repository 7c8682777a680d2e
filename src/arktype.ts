/**
 * @fileoverview ArkType schema provider for reducible.
 * This module provides the integration between the ArkType validation library and reducible's action schemas.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Type, type } from "arktype";
import { standard } from "./standard";
import type { ActionSchemaInput, ValueOf } from "./types";

type ArktypeObjectType = Type<object, object>;

/**
 * Creates an ArkType schema provider for reducible.
 *
 * @typeParam $$FeatureName - The feature name type (inferred from `defineActions`)
 * @typeParam $$PayloadArktypeDefinition - Object mapping action names to ArkType payload types
 * @typeParam $$NamespaceSeparator - Separator between feature name and action name (default: ":")
 *
 * @param args - Schema definition
 * @param args.action - Map of action names to ArkType object types defining action payloads
 * @param args.namespaceSeparator - Optional separator between feature name and action name (default: ":")
 *
 * @returns A schema provider function compatible with reducible's `ActionSchemaInput` interface
 *
 * @example
 * ```typescript
 * import { defineActions } from 'reducible';
 * import { arktype, type } from 'reducible/arktype';
 *
 * const playerActions = defineActions("player", {
 *   schema: arktype({
 *     action: {
 *       moved: type({ x: "number", y: "number" }),
 *       healed: type({ amount: "number > 0" }),
 *     },
 *   }),
 * });
 * ```
 *
 * @see {@link defineActions} for how to use this with an action schema definition
 * @see {@link ActionSchemaInput} for the schema provider interface
 */
export function arktype<
  $$FeatureName extends string,
  $$PayloadArktypeDefinition extends {
    [actionName: string]: ArktypeObjectType;
  },
  $$NamespaceSeparator extends string = ":",
>(args: {
  action: $$PayloadArktypeDefinition;
  namespaceSeparator?: $$NamespaceSeparator;
}) {
  type $$ActionStandardDefinition = {
    [key in Extract<
      keyof $$PayloadArktypeDefinition,
      string
    > as `${$$FeatureName}${$$NamespaceSeparator}${key}`]: StandardSchemaV1<
      unknown,
      {
        type: `${$$FeatureName}${$$NamespaceSeparator}${key}`;
        payload: $$PayloadArktypeDefinition[key]["infer"];
      }
    >;
  };
  type $$ActionType = StandardSchemaV1.InferOutput<
    ValueOf<$$ActionStandardDefinition>
  >;

  const input: ActionSchemaInput<$$FeatureName, $$ActionType> = (context) => {
    const namespaceSeparator = args.namespaceSeparator ?? ":";

    const action = Object.entries(args.action).reduce((acc, [key, payload]) => {
      const actionType = `${context.featureName}${namespaceSeparator}${key}`;

      // ArkType types implement Standard Schema V1 natively
      const schema = type({
        type: type.unit(actionType),
        payload,
      });

      return {
        // biome-ignore lint/performance/noAccumulatingSpread: readonly acc
        ...acc,
        [actionType]: schema,
      };
    }, {} as $$ActionStandardDefinition);

    return standard<$$FeatureName, $$ActionStandardDefinition>({
      action,
    })(context);
  };

  return input;
}

export { type } from "arktype";
