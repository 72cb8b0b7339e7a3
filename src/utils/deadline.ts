/**
 * Per-call deadlines linked to the lifetime of the inbound request
 */

export class DeadlineExceededError extends Error {
  constructor(public timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export interface Deadline {
  readonly signal: AbortSignal;
  /** True once the timer, not the parent signal, caused the abort */
  timedOut(): boolean;
  /** Clear the timer and detach from the parent signal */
  dispose(): void;
}

/**
 * Create an abort signal that fires after `timeoutMs`, or earlier when
 * `parent` aborts.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new DeadlineExceededError(timeoutMs));
  }, timeoutMs);
  timer.unref();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Run `task` under a deadline, disposing it afterwards
 */
export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (deadline: Deadline) => Promise<T>
): Promise<T> {
  const deadline = createDeadline(timeoutMs, parent);
  try {
    return await task(deadline);
  } finally {
    deadline.dispose();
  }
}

/**
 * Settle with `task`, or reject with the signal's reason as soon as it
 * aborts. The task itself keeps running.
 */
export function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Abort signal that fires when the client goes away before the response
 * has been sent.
 */
export function abortOnClose(target: { once(event: 'close', listener: () => void): unknown }): AbortSignal {
  const controller = new AbortController();
  target.once('close', () => controller.abort(new Error('Client disconnected')));
  return controller.signal;
}
