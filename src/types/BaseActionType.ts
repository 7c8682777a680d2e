/**
 * Base structure for actions described by an action schema.
 *
 * @property type - Fully-qualified action type (e.g., "counter:increment")
 * @property payload - Action payload (schema-specific)
 *
 * @internal
 */
export type BaseActionType = {
  type: string;
  payload: unknown;
};
