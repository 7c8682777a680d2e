import type { Effect } from "../Effect";
import type { Inout } from "./Inout";

/**
 * The transition contract every reducer-like unit implements.
 *
 * @remarks
 * `reduce` evolves `state` in place and describes any follow-up work as an
 * {@link Effect}. It never performs I/O, never waits and never throws for an
 * action it does not recognise: unknown actions leave the state untouched and
 * return `Effect.none()`.
 *
 * @since 1.0.0
 */
export interface Reducible<$$State, $$Action> {
  reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action>;
}
