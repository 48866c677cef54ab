/**
 * Field-survival rule for lossy API responses
 *
 * The API does not echo every field it accepts (membership role_slug) and never
 * returns write-only ones (passwords, secrets). A field therefore has three
 * states: the server supplied a value, the server supplied nothing but state
 * holds one, or neither.
 */

/**
 * True for a non-empty string
 */
export function isPresent(value: string | null | undefined): value is string {
  return typeof value === 'string' && value !== '';
}

/**
 * Server value when non-empty, else the prior value when non-empty, else null
 */
export function mergeServerValue(server: string | null | undefined, prior: string | null | undefined): string | null {
  if (isPresent(server)) return server;
  if (isPresent(prior)) return prior;
  return null;
}

/**
 * Empty or absent strings collapse to null
 */
export function nullIfEmpty(value: string | null | undefined): string | null {
  return isPresent(value) ? value : null;
}

/**
 * Empty or absent lists collapse to null
 */
export function nullIfEmptyList<T>(values: readonly T[] | null | undefined): T[] | null {
  return values && values.length > 0 ? [...values] : null;
}
