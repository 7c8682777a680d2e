import { defineActions, defineReducer, Effect, type Inout } from "../../src";
import { v, valibot } from "../../src/valibot";

/**
 * Todo action schema definition
 */
export const todoActions = defineActions("todo", {
  schema: valibot({
    action: {
      added: v.object({
        id: v.string(),
        title: v.pipe(v.string(), v.minLength(1)),
      }),
      toggled: v.object({
        id: v.string(),
      }),
      cleared: v.object({}),
    },
  }),
});

export type TodoState = {
  items: { id: string; title: string; done: boolean }[];
};

/**
 * Todo reducer
 */
export const todoReducer = defineReducer(
  todoActions,
  (state: Inout<TodoState>, action) => {
    switch (action.type) {
      case "todo:added": {
        state.value.items.push({
          id: action.payload.id,
          title: action.payload.title,
          done: false,
        });
        return Effect.none();
      }
      case "todo:toggled": {
        const item = state.value.items.find(
          (item) => item.id === action.payload.id,
        );
        if (item) {
          item.done = !item.done;
        }
        return Effect.none();
      }
      case "todo:cleared": {
        state.value.items = state.value.items.filter((item) => !item.done);
        return Effect.none();
      }
      default: {
        return Effect.none();
      }
    }
  },
);
