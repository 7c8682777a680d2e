import { assert, describe, expect, test } from "vitest";
import {
  CombineReducers,
  combineReducers,
  defineReducer,
  Effect,
  Reducer,
  ReducerBodyError,
} from "../src";

type Notice = { type: "notice"; text: string };

describe("combineReducers", () => {
  test("should create a CombineReducers reducer", () => {
    const combined = combineReducers(
      defineReducer<number, Notice>(() => Effect.none()),
    );

    expect(combined).toBeInstanceOf(CombineReducers);
    expect(combined).toBeInstanceOf(Reducer);
    expect(combined[" $$reducers"]).toHaveLength(1);
  });

  test("should merge child effects in declared order", () => {
    const first = Effect.send<Notice>({ type: "notice", text: "first" });
    const second = Effect.send<Notice>({ type: "notice", text: "second" });

    const combined = combineReducers(
      defineReducer<number, Notice>(() => first),
      defineReducer<number, Notice>(() => Effect.none()),
      defineReducer<number, Notice>(() => second),
    );

    const effect = combined.reduce({ value: 0 }, { type: "notice", text: "" });

    const operation = effect[" $$operation"];
    assert(operation.type === "merge");
    expect(operation.effects).toHaveLength(2);
    expect(operation.effects[0]).toBe(first);
    expect(operation.effects[1]).toBe(second);
  });

  test("should return none when no child produces an effect", () => {
    const combined = combineReducers(
      defineReducer<number, Notice>(() => Effect.none()),
      defineReducer<number, Notice>(() => Effect.none()),
    );

    expect(combined.reduce({ value: 0 }, { type: "notice", text: "" }).isNone).toBe(
      true,
    );
  });

  test("should run children again on every reduce", () => {
    let calls = 0;
    const combined = combineReducers(
      defineReducer<number, Notice>((state) => {
        calls += 1;
        state.value += 1;
        return Effect.none();
      }),
    );
    const state = { value: 0 };

    combined.reduce(state, { type: "notice", text: "a" });
    combined.reduce(state, { type: "notice", text: "b" });

    expect(calls).toBe(2);
    expect(state.value).toBe(2);
  });

  test("should copy the given reducer list", () => {
    const reducers = [defineReducer<number, Notice>(() => Effect.none())];
    const combined = new CombineReducers(reducers);

    reducers.push(defineReducer<number, Notice>(() => Effect.none()));

    expect(combined[" $$reducers"]).toHaveLength(1);
  });

  test("should reject an empty reducer list", () => {
    expect(() => new CombineReducers<number, Notice>([])).toThrow(
      ReducerBodyError,
    );
  });
});
