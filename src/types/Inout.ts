/**
 * A mutable cell holding the state a reducer works on.
 *
 * @remarks
 * The cell is owned by the caller and lent to a reducer for a single
 * `reduce` call. Reducers either assign `value` or mutate the object it holds,
 * and must not keep a reference to the cell after returning.
 *
 * @since 1.0.0
 */
export type Inout<$$State> = {
  value: $$State;
};
