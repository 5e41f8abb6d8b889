/**
 * Typed result for operations that can fail.
 *
 * Fit in the system:
 * - Repositories, stores and cycle services return `Result` instead of throwing, so a
 *   single failing channel or a store outage never takes the process down.
 * - `Ok(null)` means "no data"; `Err(error)` means "the operation failed".
 *
 * Contract:
 * - Narrow with `isOk()` / `isErr()` before reading `value` / `error`.
 *
 * ```ts
 * const res = await store.getCounters(channelId);
 * if (res.isErr()) return ErrResult(res.error);
 * const { totalCount } = res.value;
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }
}

/** Creates a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Creates a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> =>
  new Err(error);
