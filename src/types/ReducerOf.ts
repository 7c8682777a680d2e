import type { Reducible } from "./Reducible";

/**
 * Infer the state type of a reducer.
 */
export type StateOf<R> = R extends Reducible<infer State, infer _Action>
  ? State
  : never;

/**
 * Infer the action type of a reducer.
 */
export type ActionOf<R> = R extends Reducible<infer _State, infer Action>
  ? Action
  : never;

/**
 * A reducer over the same state and action types as `R`.
 *
 * @example
 * ```typescript
 * const analytics: ReducerOf<AppFeature> = defineReducer((state, action) => {
 *   track(action);
 *   return Effect.none();
 * });
 * ```
 *
 * @since 1.0.0
 */
export type ReducerOf<R> = Reducible<StateOf<R>, ActionOf<R>>;
