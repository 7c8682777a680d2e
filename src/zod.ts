/**
 * @fileoverview Zod schema provider for reducible.
 * This module provides the integration between the Zod validation library and reducible's action schemas.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { z } from "zod";
import { standard } from "./standard";
import type { ActionSchemaInput, ValueOf } from "./types";

type ZodEmptyObject = z.ZodObject<z.ZodRawShape>;

/**
 * Creates a Zod schema provider for reducible.
 *
 * @typeParam $$FeatureName - The feature name type (inferred from `defineActions`)
 * @typeParam $$PayloadZodDefinition - Object mapping action names to Zod payload schemas
 * @typeParam $$NamespaceSeparator - Separator between feature name and action name (default: ":")
 *
 * @param args - Schema definition
 * @param args.action - Map of action names to Zod object schemas defining action payloads
 * @param args.namespaceSeparator - Optional separator between feature name and action name (default: ":")
 *
 * @returns A schema provider function compatible with reducible's `ActionSchemaInput` interface
 *
 * @remarks
 * Zod natively implements Standard Schema V1, so the generated action schemas are handed
 * to the {@link standard} provider as they are.
 *
 * @example
 * ```typescript
 * import { defineActions } from 'reducible';
 * import { zod, z } from 'reducible/zod';
 *
 * const sessionActions = defineActions("session", {
 *   schema: zod({
 *     action: {
 *       signed_in: z.object({ userId: z.string().uuid() }),
 *       signed_out: z.object({}),
 *     },
 *     namespaceSeparator: "/",
 *   }),
 * });
 *
 * sessionActions.parseAction({ type: "session/signed_out", payload: {} });
 * ```
 *
 * @see {@link defineActions} for how to use this with an action schema definition
 * @see {@link ActionSchemaInput} for the schema provider interface
 */
export function zod<
  $$FeatureName extends string,
  $$PayloadZodDefinition extends {
    [actionName: string]: ZodEmptyObject;
  },
  $$NamespaceSeparator extends string = ":",
>(args: {
  action: $$PayloadZodDefinition;
  namespaceSeparator?: $$NamespaceSeparator;
}) {
  type $$ActionStandardDefinition = {
    [key in Extract<
      keyof $$PayloadZodDefinition,
      string
    > as `${$$FeatureName}${$$NamespaceSeparator}${key}`]: StandardSchemaV1<
      unknown,
      {
        type: `${$$FeatureName}${$$NamespaceSeparator}${key}`;
        payload: z.infer<$$PayloadZodDefinition[key]>;
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
      const schema = z.object({
        type: z.literal(type),
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

export { z } from "zod";
