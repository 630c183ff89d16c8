export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

export type Option<T> = Result<T, undefined>;

export const some = <T>(data: T): Option<T> => ok(data);

const NONE = Object.freeze(err(undefined));

export const none = <T>(): Option<T> => NONE;

/**
 * Unwraps an Option<T> into T | undefined.
 */
export const flattenOption = <T>(option: Option<T>): T | undefined =>
  option.success ? option.data : undefined;
