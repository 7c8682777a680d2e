import { getLogger, type Logger } from "@logtape/logtape";
import type { Effect } from "./Effect";
import { Reducer } from "./Reducer";
import type { Inout, Reducible } from "./types";

/**
 * A reducer that logs every action its inner reducer handles.
 *
 * @since 1.0.0
 */
export class LoggedReducer<$$State, $$Action> extends Reducer<
  $$State,
  $$Action
> {
  readonly " $$reducer": Reducible<$$State, $$Action>;
  readonly " $$name": string;
  readonly " $$logger": Logger;

  constructor(
    reducer: Reducible<$$State, $$Action>,
    options: { name: string; logger: Logger },
  ) {
    super();
    this[" $$reducer"] = reducer;
    this[" $$name"] = options.name;
    this[" $$logger"] = options.logger;
  }

  override reduce(state: Inout<$$State>, action: $$Action): Effect<$$Action> {
    const effect = this[" $$reducer"].reduce(state, action);

    this[" $$logger"].debug("{reducer} reduced {actionType}", {
      reducer: this[" $$name"],
      actionType: describeAction(action),
      action,
      state: structuredClone(state.value),
      hasEffect: !effect.isNone,
    });

    return effect;
  }
}

/**
 * Wraps a reducer so that every action it reduces is logged.
 *
 * @param reducer - The reducer to observe
 * @param options - Logging options
 * @param options.name - Name reported in log records (defaults to the reducer's class name)
 * @param options.logger - LogTape logger to write to (defaults to the `["reducible", "actions"]` category)
 * @returns A reducer behaving exactly like `reducer`
 *
 * @remarks
 * Records are written at `debug` level after the inner reducer returns, with
 * the action, a copy of the resulting state and whether an effect was
 * produced as properties. The state is copied with `structuredClone`, so it
 * must be cloneable. reducible never configures LogTape itself: nothing is printed
 * until the application calls `configure()`.
 *
 * @example
 * ```typescript
 * import { configure, getConsoleSink } from '@logtape/logtape';
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   loggers: [{ category: ["reducible"], lowestLevel: "debug", sinks: ["console"] }],
 * });
 *
 * class App extends Reducer<AppState, AppAction, Reducible<AppState, AppAction>> {
 *   override get body() {
 *     return combineReducers(logActions(new Session()), new Settings());
 *   }
 * }
 * ```
 *
 * @since 1.0.0
 */
export function logActions<$$State, $$Action>(
  reducer: Reducible<$$State, $$Action>,
  options?: {
    name?: string;
    logger?: Logger;
  },
): LoggedReducer<$$State, $$Action> {
  return new LoggedReducer(reducer, {
    name: options?.name ?? nameOf(reducer),
    logger: options?.logger ?? getLogger(["reducible", "actions"]),
  });
}

function nameOf(reducer: object): string {
  const prototype = Object.getPrototypeOf(reducer);
  if (prototype === Object.prototype || prototype === null) {
    return "Reducer";
  }

  return reducer.constructor.name || "Reducer";
}

/**
 * Short label for an action, used in log messages.
 *
 * @internal
 */
export function describeAction(action: unknown): string {
  if (typeof action === "string") {
    return action;
  }
  if (
    typeof action === "object" &&
    action !== null &&
    "type" in action &&
    typeof action.type === "string"
  ) {
    return action.type;
  }

  return typeof action;
}
