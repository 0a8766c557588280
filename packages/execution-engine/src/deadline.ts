/** Raised when an operation runs past its deadline */
export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `task` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts, whichever comes first. Rejects with DeadlineExceededError on
 * timeout and with the parent's reason on abort, even if the task ignores
 * its signal.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const stopped = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new DeadlineExceededError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort(parent.reason);
        reject(parent.reason);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    // race subscribes to both, so whichever settles second is never unhandled
    return await Promise.race([task(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}
