/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run a function (sync or async) or await a promise, returning an
 * `[ok, err, data]` tuple instead of throwing.
 *
 * Used where a failure is an expected outcome, e.g. a missing cache file.
 */
export function tryFn<T>(fn: () => Promise<T>): Promise<TryResult<T>>;
export function tryFn<T>(promise: Promise<T>): Promise<TryResult<T>>;
export function tryFn<T>(fnOrPromise: (() => Promise<T>) | Promise<T>): Promise<TryResult<T>> {
  let promise: Promise<T>;
  try {
    promise = typeof fnOrPromise === 'function' ? fnOrPromise() : fnOrPromise;
  } catch (error) {
    return Promise.resolve([false, toError(error), undefined]);
  }

  return promise.then(
    (data): TryResult<T> => [true, null, data],
    (error: unknown): TryResult<T> => [false, toError(error), undefined]
  );
}

/**
 * Synchronous version of tryFn for cases where you know the function is synchronous
 */
export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    return [true, null, fn()];
  } catch (err: unknown) {
    return [false, toError(err), undefined];
  }
}

export default tryFn;
