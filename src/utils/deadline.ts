/**
 * Deadline helpers for per-item timeouts and batch cancellation
 */

export type DeadlineReason = "timeout" | "aborted";

export class DeadlineError extends Error {
  constructor(
    readonly reason: DeadlineReason,
    message: string,
  ) {
    super(message);
    this.name = "DeadlineError";
  }
}

export interface DeadlineOptions {
  timeout?: number; // In milliseconds, undefined or 0 means none
  signal?: AbortSignal;
}

/**
 * Settle with the task, or reject with DeadlineError once the timeout elapses
 * or the signal aborts, whichever happens first.
 * The task itself keeps running; callers pass the signal on to stop it.
 */
export function withDeadline<T>(
  task: Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const { timeout, signal } = options;

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineError("aborted", "Cancelled before start"));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      cleanup();
      reject(new DeadlineError("aborted", "Cancelled"));
    };

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (timeout && timeout > 0) {
      timer = setTimeout(() => {
        cleanup();
        reject(new DeadlineError("timeout", `Timed out after ${timeout}ms`));
      }, timeout);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    task.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

/**
 * Resolve after `ms`, or reject with DeadlineError once the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineError("aborted", "Cancelled before start"));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DeadlineError("aborted", "Cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * One signal that aborts when any source aborts or the timeout elapses
 */
export function linkSignals(
  sources: Array<AbortSignal | undefined>,
  timeout?: number,
): LinkedSignal {
  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  let timer: ReturnType<typeof setTimeout> | undefined;

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    listeners.push(() => source.removeEventListener("abort", onAbort));
  }

  if (timeout && timeout > 0 && !controller.signal.aborted) {
    timer = setTimeout(
      () => controller.abort(new DeadlineError("timeout", `Timed out after ${timeout}ms`)),
      timeout,
    );
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      for (const remove of listeners) remove();
    },
  };
}
