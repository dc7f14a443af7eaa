import { error, ok, type Result } from "./result";

/**
 * Wraps `fn` so that it returns `ok(value)` when it completes and
 * `error(caught)` when it throws. The wrapper never throws.
 *
 * @example
 * const parse = monadic((raw: string) => JSON.parse(raw) as unknown);
 * parse("{").isError; // true
 */
export function monadic<A extends unknown[], T>(
  fn: (...args: A) => T,
): (...args: A) => Result<T, unknown> {
  return (...args) => {
    try {
      return ok(fn(...args));
    } catch (caught) {
      return error(caught);
    }
  };
}

/**
 * Async counterpart of {@link monadic}: the wrapper settles to `ok(value)`
 * when the returned promise fulfils and to `error(reason)` when it rejects
 * or `fn` throws before returning one.
 */
export function monadicAsync<A extends unknown[], T>(
  fn: (...args: A) => PromiseLike<T> | T,
): (...args: A) => Promise<Result<Awaited<T>, unknown>> {
  return async (...args) => {
    try {
      return ok(await fn(...args));
    } catch (caught) {
      return error(caught);
    }
  };
}
