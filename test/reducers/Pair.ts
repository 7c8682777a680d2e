import {
  combineReducers,
  Effect,
  type Inout,
  Reducer,
  type Reducible,
} from "../../src";
import { Counter } from "./Counter";

export type PairState = {
  a: number;
  b: number;
};

export type PairAction = {
  target: "a" | "b";
  type: "increment" | "decrement";
};

/**
 * Runs a `Counter` on one field of `PairState`, ignoring actions for the other field
 */
export class PairSlot extends Reducer<PairState, PairAction> {
  readonly slot: "a" | "b";
  readonly visits: string[];

  constructor(slot: "a" | "b", visits: string[]) {
    super();
    this.slot = slot;
    this.visits = visits;
  }

  override reduce(
    state: Inout<PairState>,
    action: PairAction,
  ): Effect<PairAction> {
    const slot = this.slot;
    this.visits.push(slot);

    if (action.target !== slot) {
      return Effect.none();
    }

    const cell = { value: state.value[slot] };
    const effect = new Counter().reduce(cell, action);
    state.value[slot] = cell.value;

    return effect.map((counterAction) => ({ ...counterAction, target: slot }));
  }
}

/**
 * Composite of two counters, `a` then `b`
 */
export class Pair extends Reducer<
  PairState,
  PairAction,
  Reducible<PairState, PairAction>
> {
  readonly visits: string[] = [];

  override get body() {
    return combineReducers(
      new PairSlot("a", this.visits),
      new PairSlot("b", this.visits),
    );
  }
}
