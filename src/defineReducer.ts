import type { Effect } from "./Effect";
import { Reducer } from "./Reducer";
import type { InferActionFromSchema, Inout } from "./types";

/**
 * A state transition written as a function.
 *
 * @since 1.0.0
 */
export type ReduceFunction<$$State, $$Action> = (
  state: Inout<$$State>,
  action: $$Action,
) => Effect<$$Action>;

/**
 * A primitive reducer backed by a function.
 *
 * @remarks
 * Usually created with {@link defineReducer}. Handy for small pieces of logic
 * inside a composite body that do not deserve their own class.
 *
 * @since 1.0.0
 */
export class Reduce<$$State, $$Action> extends Reducer<$$State, $$Action> {
  readonly " $$reduce": ReduceFunction<$$State, $$Action>;

  constructor(reduce: ReduceFunction<$$State, $$Action>) {
    super();
    this[" $$reduce"] = reduce;
  }

  override reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action> {
    return this[" $$reduce"](state, action);
  }
}

/**
 * Defines a primitive reducer from a function.
 *
 * @param actions - Optional action schema created with `defineActions()`, used to type `action`
 * @param fn - The reducer implementation
 * @returns A reducer running `fn`
 *
 * @remarks
 * The function receives the state cell and the action. It mutates
 * `state.value` (or the object it holds) and returns an {@link Effect}
 * describing follow-up work, or `Effect.none()`.
 *
 * Reducers must handle every action they receive. Actions they do not care
 * about are no-ops, not errors.
 *
 * @example
 * ```typescript
 * import { defineReducer, Effect } from 'reducible';
 *
 * type CounterAction = { type: "increment" } | { type: "decrement" };
 *
 * const counter = defineReducer<number, CounterAction>((state, action) => {
 *   switch (action.type) {
 *     case "increment":
 *       state.value += 1;
 *       return Effect.none();
 *     case "decrement":
 *       state.value -= 1;
 *       return Effect.none();
 *   }
 * });
 * ```
 *
 * @example
 * Typing actions from an action schema:
 * ```typescript
 * const counterReducer = defineReducer(counterActions, (state: Inout<{ count: number }>, action) => {
 *   switch (action.type) {
 *     case "counter:added":
 *       state.value.count += action.payload.amount;
 *       return Effect.none();
 *     default:
 *       return Effect.none();
 *   }
 * });
 * ```
 *
 * @since 1.0.0
 */
export function defineReducer<$$State, $$Action>(
  fn: ReduceFunction<$$State, $$Action>,
): Reduce<$$State, $$Action>;
export function defineReducer<$$ActionSchema, $$State>(
  actions: $$ActionSchema,
  fn: ReduceFunction<$$State, InferActionFromSchema<$$ActionSchema>>,
): Reduce<$$State, InferActionFromSchema<$$ActionSchema>>;
export function defineReducer<$$State, $$Action>(
  ...args:
    | [fn: ReduceFunction<$$State, $$Action>]
    | [actions: unknown, fn: ReduceFunction<$$State, $$Action>]
): Reduce<$$State, $$Action> {
  return new Reduce(args.length === 1 ? args[0] : args[1]);
}
