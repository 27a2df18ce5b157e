/** A call outlived its deadline. Callers decide what a late call means, so this is not a SimulationError. */
export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Settles with `task` unless `ms` passes first. The task itself is not
 * cancelled; whatever it produces late is dropped. A limit of zero or less
 * (or a non-finite one) disables the deadline.
 */
export function withTimeout<T>(
  task: Promise<T> | (() => Promise<T>),
  ms: number,
  label = "Operation",
): Promise<T> {
  const promise = typeof task === "function" ? invoke(task) : task;
  if (!Number.isFinite(ms) || ms <= 0) return promise;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    timer.unref();
    promise.then(
      (value) => { clearTimeout(timer); resolve(value); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}

// A factory that throws before returning a promise still counts as a rejection.
function invoke<T>(task: () => Promise<T>): Promise<T> {
  try {
    return task();
  } catch (err) {
    return Promise.reject(err);
  }
}
