export type Outcome = { ok: true } | { ok: false; error: unknown };

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Runs `run` and calls `onSettled` once it has finished: straight away for
 * a plain value or a throw, after settlement for a promise. The result or
 * error passes through untouched.
 */
export function whenSettled<T>(run: () => Promise<T>, onSettled: (outcome: Outcome) => void): Promise<T>;
export function whenSettled<T>(run: () => T, onSettled: (outcome: Outcome) => void): T;
export function whenSettled(run: () => unknown, onSettled: (outcome: Outcome) => void): unknown {
  let result: unknown;
  try {
    result = run();
  } catch (error) {
    onSettled({ ok: false, error });
    throw error;
  }

  if (isPromiseLike(result)) {
    return Promise.resolve(result).then(
      (value) => {
        onSettled({ ok: true });
        return value;
      },
      (error: unknown) => {
        onSettled({ ok: false, error });
        throw error;
      },
    );
  }

  onSettled({ ok: true });
  return result;
}
