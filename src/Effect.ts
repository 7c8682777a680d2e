/**
 * The operation an {@link Effect} describes.
 *
 * @remarks
 * Effect engines switch on `type`:
 *
 * - `none`: nothing to do
 * - `send`: feed `action` back into the reducer
 * - `run`: start `run`, feeding every action it passes to `send` back into the reducer
 * - `merge`: run every effect in `effects` concurrently
 *
 * `merge` never contains a `none` or another `merge`.
 *
 * @since 1.0.0
 */
export type EffectOperation<$$Action> =
  | { type: "none" }
  | { type: "send"; action: $$Action }
  | {
      type: "run";
      run: (send: (action: $$Action) => void) => Promise<void>;
    }
  | { type: "merge"; effects: readonly Effect<$$Action>[] };

/**
 * A description of deferred work that eventually yields actions of type `$$Action`.
 *
 * @remarks
 * Effects are plain values returned from `reduce`. Creating one does not start
 * anything: executing, cancelling and scheduling effects is the job of the
 * runtime that drives the reducer. An effect only ever emits actions of the
 * type it is declared with, which is what lets the runtime route them back to
 * the reducer that produced it.
 *
 * @example
 * ```typescript
 * case "timer:started":
 *   state.value.isRunning = true;
 *   return Effect.run(async (send) => {
 *     await sleep(1000);
 *     send({ type: "timer:ticked", payload: {} });
 *   });
 * ```
 *
 * @since 1.0.0
 */
export class Effect<$$Action> {
  /**
   * @internal
   */
  readonly " $$operation": EffectOperation<$$Action>;

  private constructor(operation: EffectOperation<$$Action>) {
    this[" $$operation"] = operation;
  }

  /**
   * An effect that does nothing.
   */
  static none<$$Action = never>(): Effect<$$Action> {
    return new Effect<$$Action>({ type: "none" });
  }

  /**
   * An effect that immediately emits `action`.
   */
  static send<$$Action>(action: $$Action): Effect<$$Action> {
    return new Effect({ type: "send", action });
  }

  /**
   * An effect wrapping asynchronous work.
   *
   * @param run - Work to perform. Every action passed to `send` is fed back into the reducer.
   */
  static run<$$Action>(
    run: (send: (action: $$Action) => void) => Promise<void>,
  ): Effect<$$Action> {
    return new Effect({ type: "run", run });
  }

  /**
   * Combines effects into one that runs all of them.
   *
   * Nested merges are flattened and `none` effects are dropped. Merging
   * nothing yields `none`; merging a single effect yields that effect.
   */
  static merge<$$Action>(...effects: Effect<$$Action>[]): Effect<$$Action> {
    const flattened: Effect<$$Action>[] = [];

    for (const effect of effects) {
      const operation = effect[" $$operation"];

      switch (operation.type) {
        case "none":
          break;
        case "merge":
          flattened.push(...operation.effects);
          break;
        default:
          flattened.push(effect);
      }
    }

    const [only] = flattened;

    if (!only) {
      return Effect.none();
    }
    if (flattened.length === 1) {
      return only;
    }

    return new Effect({ type: "merge", effects: flattened });
  }

  /**
   * Whether this effect does nothing.
   */
  get isNone(): boolean {
    return this[" $$operation"].type === "none";
  }

  /**
   * Transforms every action this effect emits.
   */
  map<$$NextAction>(
    transform: (action: $$Action) => $$NextAction,
  ): Effect<$$NextAction> {
    const operation = this[" $$operation"];

    switch (operation.type) {
      case "none":
        return Effect.none();
      case "send":
        return Effect.send(transform(operation.action));
      case "run":
        return Effect.run((send) =>
          operation.run((action) => send(transform(action))),
        );
      case "merge":
        return new Effect<$$NextAction>({
          type: "merge",
          effects: operation.effects.map((effect) => effect.map(transform)),
        });
    }
  }
}
