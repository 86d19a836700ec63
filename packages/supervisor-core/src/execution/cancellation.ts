/**
 * Cancellation token of one invocation: the caller's signal and an optional
 * deadline merged into a single AbortSignal handed to every step.
 */

import { CancellationError } from '@switchboard/supervisor-contracts';

export interface Cancellation {
  readonly signal: AbortSignal;
  /** Why the run was cancelled; empty until it is */
  reason(): string;
  /** Clears the deadline timer and detaches from the caller's signal */
  dispose(): void;
}

export function createCancellation(external?: AbortSignal, timeoutMs?: number): Cancellation {
  const controller = new AbortController();
  let reason = '';

  const abort = (why: string): void => {
    if (controller.signal.aborted) {return;}
    reason = why;
    controller.abort(new CancellationError(why));
  };

  const onExternalAbort = (): void => abort(describeReason(external?.reason));

  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined) {
    timer = setTimeout(() => abort(`Deadline of ${timeoutMs}ms exceeded`), timeoutMs);
    timer.unref();
  }

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      if (timer) {clearTimeout(timer);}
      external?.removeEventListener('abort', onExternalAbort);
    },
  };
}

function describeReason(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  if (typeof reason === 'string' && reason.length > 0) {
    return reason;
  }
  return 'Invocation cancelled';
}
