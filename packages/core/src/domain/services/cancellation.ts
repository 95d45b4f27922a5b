import { TransportError } from '../errors/TransportError.js';

/** Human-readable reason an abort signal fired. */
export function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string' && reason !== '') return reason;
  if (reason instanceof Error && reason.message !== '') return reason.message;
  return 'Submission was cancelled';
}

/**
 * Settle with `promise`, or reject with an `aborted` `TransportError` as soon as
 * the signal fires, whichever comes first. Keeps a collaborator that ignores
 * the signal from leaving the caller pending.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new TransportError('aborted', abortMessage(signal)));
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Wait `ms` milliseconds. Rejects with an `aborted` `TransportError` if the signal fires first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const wait = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });

  return raceAbort(wait, signal).finally(() => {
    clearTimeout(timer);
  });
}
