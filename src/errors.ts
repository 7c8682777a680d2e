import type { StandardSchemaV1 } from "@standard-schema/spec";

/**
 * Thrown when a reducer is run through a body it does not have.
 *
 * @remarks
 * Reducers either override `reduce` or declare a `body`. A reducer doing
 * neither (reason `"missing"`), or declaring a body that combines no reducers
 * (reason `"empty"`), cannot reduce anything. This is a wiring mistake, not a
 * runtime condition: nothing in reducible catches it.
 *
 * @since 1.0.0
 */
export class ReducerBodyError extends Error {
  readonly reducerName: string;
  readonly reason: "missing" | "empty";

  constructor(reducerName: string, reason: "missing" | "empty") {
    super(
      reason === "missing"
        ? `'${reducerName}' has no body. Do not access a reducer's 'body' property directly, as it may not exist. ` +
            `To run a reducer, call 'reduce(state, action)' instead.`
        : `'${reducerName}' has an empty body. Combine at least one reducer.`,
    );
    this.name = "ReducerBodyError";
    this.reducerName = reducerName;
    this.reason = reason;
  }
}

/**
 * Thrown when an action does not match its action schema.
 *
 * @since 1.0.0
 */
export class ActionValidationError extends Error {
  readonly issues: readonly StandardSchemaV1.Issue[];

  constructor(
    message: string,
    issues: readonly StandardSchemaV1.Issue[],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ActionValidationError";
    this.issues = issues;
  }
}
