export interface LinkedAbort {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * An AbortSignal that fires when `parent` aborts or after `timeoutMs`,
 * whichever comes first. The timeout reason is a DOMException named
 * `TimeoutError`, matching `AbortSignal.timeout`.
 */
export function linkAbort(parent: AbortSignal | undefined, timeoutMs?: number): LinkedAbort {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => {
          controller.abort(new DOMException(`Timed out after ${timeoutMs}ms`, 'TimeoutError'));
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

export function isTimeoutReason(reason: unknown): boolean {
  return reason instanceof DOMException && reason.name === 'TimeoutError';
}
