import { describe, expect, expectTypeOf, test } from "vitest";
import {
  defineReducer,
  Effect,
  type InferActionFromSchema,
  type Inout,
  Reduce,
  Reducer,
} from "../src";
import { todoActions, todoReducer, type TodoState } from "./reducers/Todo";

describe("defineReducer", () => {
  test("should create a primitive reducer from a function", () => {
    const toggle = defineReducer<boolean, "toggle">((state) => {
      state.value = !state.value;
      return Effect.none();
    });
    const state = { value: false };

    toggle.reduce(state, "toggle");

    expect(toggle).toBeInstanceOf(Reduce);
    expect(toggle).toBeInstanceOf(Reducer);
    expect(state.value).toBe(true);
  });

  test("should return the function's effect", () => {
    const echo = defineReducer<null, string>((_state, action) =>
      Effect.send(`${action}!`),
    );

    expect(echo.reduce({ value: null }, "hi")[" $$operation"]).toEqual({
      type: "send",
      action: "hi!",
    });
  });

  test("should type actions from an action schema", () => {
    expectTypeOf(todoReducer).toEqualTypeOf<
      Reduce<TodoState, InferActionFromSchema<typeof todoActions>>
    >();
  });

  test("should reduce schema-typed actions", () => {
    const state: Inout<TodoState> = { value: { items: [] } };

    todoReducer.reduce(
      state,
      todoActions.createAction("todo:added", { id: "1", title: "Write tests" }),
    );
    todoReducer.reduce(
      state,
      todoActions.createAction("todo:added", { id: "2", title: "Ship" }),
    );
    todoReducer.reduce(
      state,
      todoActions.createAction("todo:toggled", { id: "1" }),
    );

    expect(state.value.items).toEqual([
      { id: "1", title: "Write tests", done: true },
      { id: "2", title: "Ship", done: false },
    ]);

    todoReducer.reduce(state, todoActions.createAction("todo:cleared", {}));

    expect(state.value.items).toEqual([{ id: "2", title: "Ship", done: false }]);
  });

  test("should ignore toggles for unknown items", () => {
    const state: Inout<TodoState> = {
      value: { items: [{ id: "1", title: "Write tests", done: false }] },
    };

    const effect = todoReducer.reduce(
      state,
      todoActions.createAction("todo:toggled", { id: "missing" }),
    );

    expect(effect.isNone).toBe(true);
    expect(state.value.items).toEqual([
      { id: "1", title: "Write tests", done: false },
    ]);
  });
});
