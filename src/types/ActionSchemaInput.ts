import type { BaseActionType } from "./BaseActionType";

/**
 * Schema provider function signature for pluggable validation libraries.
 *
 * @typeParam $$FeatureName - The feature name type
 * @typeParam $$ActionType - The action type structure
 *
 * @param context - Schema context
 * @param context.featureName - The feature name used to namespace action types
 * @returns Schema provider with validation methods
 *
 * @remarks
 * This interface lets reducible support multiple validation libraries
 * (Valibot, Zod, ArkType, or any Standard Schema implementation) through one API.
 *
 * @internal
 */
export type ActionSchemaInput<
  $$FeatureName,
  $$ActionType extends BaseActionType,
> = (context: { featureName: $$FeatureName }) => {
  actionTypes: readonly string[];
  parseAction(input: unknown): $$ActionType;
  parseActionByType<K extends $$ActionType["type"]>(
    type: K,
    input: unknown,
  ): Extract<$$ActionType, { type: K }>;
};
