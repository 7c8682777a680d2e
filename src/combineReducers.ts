import { Effect } from "./Effect";
import { ReducerBodyError } from "./errors";
import { Reducer } from "./Reducer";
import type { Inout, Reducible } from "./types";

/**
 * A reducer running a fixed sequence of reducers over the same state.
 *
 * @remarks
 * Children run once per action, top to bottom, against the same state cell,
 * so every child sees the mutations of the ones before it. Their effects are
 * merged into one. Errors thrown by a child are not caught: they reach the
 * caller and the remaining children do not run.
 *
 * @since 1.0.0
 */
export class CombineReducers<$$State, $$Action> extends Reducer<
  $$State,
  $$Action
> {
  readonly " $$reducers": readonly Reducible<$$State, $$Action>[];

  constructor(reducers: readonly Reducible<$$State, $$Action>[]) {
    super();

    if (reducers.length === 0) {
      throw new ReducerBodyError("CombineReducers", "empty");
    }

    this[" $$reducers"] = [...reducers];
  }

  override reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action> {
    const effects: Effect<$$Action>[] = [];

    for (const reducer of this[" $$reducers"]) {
      effects.push(reducer.reduce(state, action));
    }

    return Effect.merge(...effects);
  }
}

/**
 * Combines reducers into one that runs them in order.
 *
 * @param reducers - The reducers to run, in order
 * @returns A reducer running every given reducer
 * @throws {ReducerBodyError} If no reducer is given
 *
 * @remarks
 * This is the usual way to build the `body` of a composite reducer:
 *
 * ```
 * reduce(state, action)
 *   → reducers[0].reduce(state, action)
 *   → reducers[1].reduce(state, action)
 *   → ...
 *   → Effect.merge(...effects)
 * ```
 *
 * Order matters: a reducer placed after another observes the state that one
 * produced for the same action.
 *
 * @example
 * ```typescript
 * import { combineReducers, defineReducer, Effect, Reducer } from 'reducible';
 * import type { Reducible } from 'reducible';
 *
 * class Checkout extends Reducer<CheckoutState, CheckoutAction, Reducible<CheckoutState, CheckoutAction>> {
 *   override get body() {
 *     return combineReducers(
 *       new Cart(),
 *       new Payment(),
 *       defineReducer<CheckoutState, CheckoutAction>((state, action) => {
 *         state.value.canSubmit = state.value.cart.items.length > 0 && state.value.payment.isValid;
 *         return Effect.none();
 *       }),
 *     );
 *   }
 * }
 * ```
 *
 * @since 1.0.0
 */
export function combineReducers<$$State, $$Action>(
  ...reducers: [
    Reducible<$$State, $$Action>,
    ...Reducible<$$State, $$Action>[],
  ]
): CombineReducers<$$State, $$Action> {
  return new CombineReducers(reducers);
}
