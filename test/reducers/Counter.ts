import { Effect, type Inout, Reducer } from "../../src";

export type CounterAction = { type: "increment" } | { type: "decrement" };

/**
 * Primitive counter over a plain number
 */
export class Counter extends Reducer<number, CounterAction> {
  override reduce(
    state: Inout<number>,
    action: CounterAction,
  ): Effect<CounterAction> {
    switch (action.type) {
      case "increment": {
        state.value += 1;
        return Effect.none();
      }
      case "decrement": {
        state.value -= 1;
        return Effect.none();
      }
    }
  }
}
