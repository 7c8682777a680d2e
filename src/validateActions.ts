import { getLogger, type Logger } from "@logtape/logtape";
import { Effect } from "./Effect";
import { ActionValidationError } from "./errors";
import { describeAction } from "./logActions";
import { Reducer } from "./Reducer";
import type { Inout, Reducible } from "./types";

type ActionParser<$$Action> = {
  parseAction(input: unknown): $$Action;
};

/**
 * A reducer that validates actions before and after its inner reducer sees them.
 *
 * @since 1.0.0
 */
export class ValidatedReducer<$$State, $$Action> extends Reducer<
  $$State,
  $$Action
> {
  readonly " $$reducer": Reducible<$$State, $$Action>;
  readonly " $$actions": ActionParser<$$Action>;
  readonly " $$onInvalidAction"?: (
    error: ActionValidationError,
    input: unknown,
  ) => void;
  readonly " $$logger": Logger;

  constructor(
    reducer: Reducible<$$State, $$Action>,
    actions: ActionParser<$$Action>,
    options: {
      onInvalidAction?: (error: ActionValidationError, input: unknown) => void;
      logger: Logger;
    },
  ) {
    super();
    this[" $$reducer"] = reducer;
    this[" $$actions"] = actions;
    this[" $$onInvalidAction"] = options.onInvalidAction;
    this[" $$logger"] = options.logger;
  }

  override reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action> {
    const incoming = this.parse(action);
    if (!incoming.ok) {
      return Effect.none();
    }

    const draft = { value: structuredClone(state.value) };
    const effect = this.verify(
      this[" $$reducer"].reduce(draft, incoming.action),
    );
    if (!effect) {
      return Effect.none();
    }

    state.value = draft.value;
    return effect;
  }

  /**
   * Parses `input`, reporting a rejection through `onInvalidAction` when set.
   * Without a handler, validation errors are thrown.
   */
  private parse(
    input: unknown,
  ): { ok: true; action: $$Action } | { ok: false } {
    const onInvalidAction = this[" $$onInvalidAction"];

    try {
      return { ok: true, action: this[" $$actions"].parseAction(input) };
    } catch (error) {
      if (!(error instanceof ActionValidationError) || !onInvalidAction) {
        throw error;
      }

      this[" $$logger"].warn("Dropped invalid action {actionType}", {
        actionType: describeAction(input),
        issues: error.issues,
      });
      onInvalidAction(error, input);

      return { ok: false };
    }
  }

  /**
   * Parses the actions an effect emits. Sent actions are checked now and
   * `undefined` is returned when one is dropped. Actions of `run` effects
   * are checked as they are sent, and dropped ones are never forwarded.
   */
  private verify(effect: Effect<$$Action>): Effect<$$Action> | undefined {
    const operation = effect[" $$operation"];

    switch (operation.type) {
      case "none":
        return effect;
      case "send": {
        const emitted = this.parse(operation.action);
        return emitted.ok ? Effect.send(emitted.action) : undefined;
      }
      case "run":
        return Effect.run((send) =>
          operation.run((action) => {
            const emitted = this.parse(action);
            if (emitted.ok) {
              send(emitted.action);
            }
          }),
        );
      case "merge": {
        const verified: Effect<$$Action>[] = [];
        for (const child of operation.effects) {
          const checked = this.verify(child);
          if (!checked) {
            return undefined;
          }
          verified.push(checked);
        }
        return Effect.merge(...verified);
      }
    }
  }
}

/**
 * Wraps a reducer so that it only ever sees, and only ever emits, valid actions.
 *
 * @param reducer - The reducer to protect
 * @param actions - Action schema created with `defineActions()`
 * @param options - Validation options
 * @param options.onInvalidAction - Called with the validation error and the raw input when an incoming action is invalid
 * @param options.logger - LogTape logger for dropped actions (defaults to the `["reducible", "validation"]` category)
 * @returns A reducer validating every action
 *
 * @remarks
 * Incoming actions are parsed with the schema before the inner reducer runs.
 * When parsing fails:
 *
 * - without `onInvalidAction`, the {@link ActionValidationError} is thrown to the caller
 * - with `onInvalidAction`, the action is dropped: the state is left untouched,
 *   a warning is logged, the callback runs and `Effect.none()` is returned
 *
 * The inner reducer runs on a copy of the state (made with `structuredClone`,
 * so states must be cloneable), which is written back only once the actions
 * it sends have been parsed too. An invalid sent action is handled like an
 * invalid incoming one: it is thrown, or with `onInvalidAction` the whole
 * transition is dropped and the state stays untouched. Actions of a `run`
 * effect are parsed as they are sent; invalid ones are thrown from the effect,
 * or reported to `onInvalidAction` and not forwarded.
 *
 * @example
 * ```typescript
 * const counter = validateActions(counterReducer, counterActions, {
 *   onInvalidAction: (error, input) => {
 *     reportToSentry(error, { input });
 *   },
 * });
 *
 * // e.g. an action decoded from a WebSocket message
 * counter.reduce(state, JSON.parse(message));
 * ```
 *
 * @since 1.0.0
 */
export function validateActions<$$State, $$Action>(
  reducer: Reducible<$$State, $$Action>,
  actions: ActionParser<$$Action>,
  options?: {
    onInvalidAction?: (error: ActionValidationError, input: unknown) => void;
    logger?: Logger;
  },
): ValidatedReducer<$$State, $$Action> {
  return new ValidatedReducer(reducer, actions, {
    onInvalidAction: options?.onInvalidAction,
    logger: options?.logger ?? getLogger(["reducible", "validation"]),
  });
}
