/**
 * Outcome of a computation that may fail without throwing.
 */
export type Result<T, E> =
  | {
      readonly ok: true;
      readonly data: T;
    }
  | {
      readonly ok: false;
      readonly error: E;
    };

export const ok = <T, E>(data: T): Result<T, E> => ({ ok: true, data });

export const err = <T, E>(error: E): Result<T, E> => ({ ok: false, error });
