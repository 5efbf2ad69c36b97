/**
 * Async generator helpers
 */

/**
 * Wrap a lazily started generator so that closing it before the first
 * `next()` still runs `release`. An unstarted generator skips its own
 * `finally` blocks on `return()`; once started, those blocks run as usual
 * and `release` is not called.
 */
export const releaseOnClose = <T>(
  generator: AsyncGenerator<T, void, unknown>,
  release: () => void | Promise<unknown>
): AsyncGenerator<T, void, unknown> => {
  let started = false;

  const closeUnstarted = async (): Promise<void> => {
    if (started) return;
    started = true;
    await generator.return(undefined);
    await release();
  };

  const wrapper: AsyncGenerator<T, void, unknown> = {
    next: (...args: [] | [unknown]) => {
      started = true;
      return generator.next(...args);
    },
    return: async (value: void | PromiseLike<void>) => {
      await closeUnstarted();
      return generator.return(value);
    },
    throw: async (error: unknown) => {
      await closeUnstarted();
      return generator.throw(error);
    },
    [Symbol.asyncIterator]: () => wrapper,
  };
  return wrapper;
};
