import type { StandardSchemaV1 } from "@standard-schema/spec";
import { ActionValidationError } from "./errors";
import type { ActionSchemaInput, BaseActionType, ValueOf } from "./types";

/**
 * Creates a Standard Schema provider for reducible.
 *
 * This is a generic adapter that allows any Standard Schema-compliant validation library
 * to describe the actions a reducer handles.
 *
 * @typeParam $$FeatureName - The feature name type (inferred from `defineActions`)
 * @typeParam $$ActionDefinition - Object mapping fully-qualified action types to Standard Schema instances
 *
 * @param args - Schema definition
 * @param args.action - Map of action types to Standard Schema instances validating the whole action
 *
 * @returns A schema provider function compatible with reducible's `ActionSchemaInput` interface
 *
 * @remarks
 * This provider implements the Standard Schema specification (https://standardschema.dev),
 * allowing any compliant validation library (Valibot, Zod, ArkType, etc.) to integrate with reducible.
 * Each schema validates a complete `{ type, payload }` object, so the keys must be the
 * fully-qualified action types.
 *
 * Note: Async validation is not supported. The schema must return a synchronous result.
 *
 * @example
 * ```typescript
 * import { defineActions } from 'reducible';
 * import { standard } from 'reducible/standard';
 * import * as v from 'valibot'; // or any Standard Schema library
 *
 * const counterActions = defineActions("counter", {
 *   schema: standard({
 *     action: {
 *       "counter:added": v.object({
 *         type: v.literal("counter:added"),
 *         payload: v.object({ amount: v.number() }),
 *       }),
 *       "counter:reset": v.object({
 *         type: v.literal("counter:reset"),
 *         payload: v.object({}),
 *       }),
 *     },
 *   }),
 * });
 * ```
 *
 * @see {@link https://standardschema.dev} for Standard Schema specification
 * @see {@link valibot} for a higher-level Valibot integration that handles action namespacing automatically
 */
export function standard<
  $$FeatureName extends string,
  $$ActionDefinition extends {
    [type: string]: StandardSchemaV1<unknown, BaseActionType>;
  },
>(args: {
  action: $$ActionDefinition;
}): ActionSchemaInput<
  $$FeatureName,
  StandardSchemaV1.InferOutput<ValueOf<$$ActionDefinition>>
> {
  type $$ActionType = StandardSchemaV1.InferOutput<ValueOf<$$ActionDefinition>>;

  const schemas: { [type: string]: StandardSchemaV1 } = args.action;
  const actionTypes = Object.keys(schemas);

  const findSchema = (type: string): StandardSchemaV1 | undefined =>
    Object.hasOwn(schemas, type) ? schemas[type] : undefined;

  return () => {
    return {
      actionTypes,
      parseAction(input) {
        const type = readActionType(input);
        const schema = type === undefined ? undefined : findSchema(type);

        if (!schema) {
          throw new ActionValidationError(
            `Unknown action type "${type ?? typeof input}". Available action types: ${actionTypes.join(", ")}`,
            [{ message: "Unknown action type", path: ["type"] }],
          );
        }

        return standardValidate(schema, input) as $$ActionType;
      },
      parseActionByType<K extends $$ActionType["type"]>(
        type: K,
        input: unknown,
      ) {
        const schema = findSchema(type);

        if (!schema) {
          throw new Error(
            `Action type "${type}" not found. Available action types: ${actionTypes.join(", ")}`,
          );
        }

        return standardValidate(schema, input) as Extract<
          $$ActionType,
          { type: K }
        >;
      },
    };
  };
}

/**
 * Reads the `type` field of an unvalidated action.
 *
 * @internal
 */
function readActionType(input: unknown): string | undefined {
  if (
    typeof input === "object" &&
    input !== null &&
    "type" in input &&
    typeof input.type === "string"
  ) {
    return input.type;
  }

  return undefined;
}

/**
 * Validates input against a Standard Schema.
 *
 * @param schema - The Standard Schema to validate against
 * @param input - The input value to validate
 * @returns The validated and typed output
 * @throws {ActionValidationError} If validation fails
 * @throws {Error} If the schema returns a Promise
 *
 * @internal
 */
function standardValidate<T extends StandardSchemaV1>(
  schema: T,
  input: unknown,
): StandardSchemaV1.InferOutput<T> {
  const result = schema["~standard"].validate(input);

  if (result instanceof Promise) {
    throw new Error("Promise validation result is not supported");
  }
  if (result.issues) {
    throw new ActionValidationError(
      `Invalid action "${readActionType(input)}": ${result.issues.map((issue) => issue.message).join("; ")}`,
      result.issues,
    );
  }

  return result.value as StandardSchemaV1.InferOutput<T>;
}
