import type { Effect } from "./Effect";
import { ReducerBodyError } from "./errors";
import type { Inout, Reducible } from "./types";

/**
 * Base class for reducers.
 *
 * @typeParam $$State - The state this reducer evolves
 * @typeParam $$Action - The actions this reducer handles
 * @typeParam $$Body - The type of the composite body, `never` for primitive reducers
 *
 * @remarks
 * A reducer gets its behavior from exactly one of two places:
 *
 * - **Primitive reducers** override {@link Reducer.reduce} and implement the
 *   state transition directly. They leave `$$Body` as `never`.
 * - **Composite reducers** override {@link Reducer.body} and return other
 *   reducers, usually with `combineReducers()`. The inherited `reduce`
 *   forwards every call to the body and returns its effect unchanged.
 *
 * If a reducer overrides `reduce`, that implementation always runs and `body`
 * is never read, even when it is also overridden. Business logic that should
 * run alongside a body belongs inside the body, as a `defineReducer()` entry
 * or a dedicated reducer.
 *
 * A reducer overriding neither throws a {@link ReducerBodyError} from `reduce`.
 *
 * @example
 * Primitive reducer:
 * ```typescript
 * class Counter extends Reducer<number, "increment" | "decrement"> {
 *   override reduce(state: Inout<number>, action: "increment" | "decrement") {
 *     state.value += action === "increment" ? 1 : -1;
 *     return Effect.none<"increment" | "decrement">();
 *   }
 * }
 * ```
 *
 * @example
 * Composite reducer:
 * ```typescript
 * class App extends Reducer<AppState, AppAction, Reducible<AppState, AppAction>> {
 *   override get body() {
 *     return combineReducers(
 *       new Session(),
 *       defineReducer<AppState, AppAction>((state, action) => {
 *         // ...
 *         return Effect.none();
 *       }),
 *       logActions(new Analytics()),
 *     );
 *   }
 * }
 * ```
 *
 * @since 1.0.0
 */
export abstract class Reducer<
  $$State,
  $$Action,
  $$Body extends Reducible<$$State, $$Action> = never,
> implements Reducible<$$State, $$Action>
{
  /**
   * Evolves `state` in place for `action` and describes follow-up work.
   *
   * Override this in primitive reducers. The default implementation runs the
   * reducer's {@link Reducer.body}.
   */
  reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action> {
    return this.body.reduce(state, action);
  }

  /**
   * The reducers this reducer is composed of.
   *
   * Override this in composite reducers. Do not read it directly: to run a
   * reducer, call {@link Reducer.reduce}. The default implementation throws a
   * {@link ReducerBodyError}.
   */
  get body(): $$Body {
    throw new ReducerBodyError(this.constructor.name || "Reducer", "missing");
  }
}
