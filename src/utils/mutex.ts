/**
 * Promise-chain mutex. Callers run one at a time, in arrival order.
 */
export interface Mutex {
  runExclusive: <T>(fn: () => T | Promise<T>) => Promise<T>;
}

export const createMutex = (): Mutex => {
  let tail: Promise<void> = Promise.resolve();

  return {
    runExclusive: <T>(fn: () => T | Promise<T>): Promise<T> => {
      const run = tail.then(fn);
      // The next caller waits for this one to settle, whatever the outcome;
      // the outcome itself goes to this caller through `run`.
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    },
  };
};
