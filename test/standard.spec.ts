import type { StandardSchemaV1 } from "@standard-schema/spec";
import * as v from "valibot";
import { assert, describe, expect, test } from "vitest";
import { ActionValidationError, defineActions } from "../src";
import { standard } from "../src/standard";

describe("Standard Schema Provider", () => {
  const lightActions = defineActions("light", {
    schema: standard({
      action: {
        "light:switched_on": v.object({
          type: v.literal("light:switched_on"),
          payload: v.object({ brightness: v.number() }),
        }),
        "light:switched_off": v.object({
          type: v.literal("light:switched_off"),
          payload: v.object({}),
        }),
      },
    }),
  });

  test("should use the given keys as action types", () => {
    expect(lightActions.actionTypes).toEqual([
      "light:switched_on",
      "light:switched_off",
    ]);
  });

  test("should parse actions by their type field", () => {
    expect(
      lightActions.parseAction({
        type: "light:switched_on",
        payload: { brightness: 80 },
      }),
    ).toEqual({ type: "light:switched_on", payload: { brightness: 80 } });
  });

  test("should not resolve inherited object keys as action types", () => {
    let caught: unknown;
    try {
      lightActions.parseAction({ type: "toString", payload: {} });
    } catch (error) {
      caught = error;
    }

    assert(caught instanceof ActionValidationError);
    expect(caught.message).toBe(
      'Unknown action type "toString". Available action types: light:switched_on, light:switched_off',
    );
    expect(caught.issues).toEqual([
      { message: "Unknown action type", path: ["type"] },
    ]);
  });

  test("should reject asynchronous validators", () => {
    const asyncSchema: StandardSchemaV1<
      unknown,
      { type: "light:dimmed"; payload: {} }
    > = {
      "~standard": {
        version: 1,
        vendor: "test",
        validate: async () => ({
          value: { type: "light:dimmed", payload: {} },
        }),
      },
    };
    const asyncActions = defineActions("light", {
      schema: standard({ action: { "light:dimmed": asyncSchema } }),
    });

    expect(() =>
      asyncActions.parseAction({ type: "light:dimmed", payload: {} }),
    ).toThrow("Promise validation result is not supported");
  });
});
