import { JobCancelledError } from '../types/errors.js';

/**
 * Resolve after `ms`, or reject with `JobCancelledError` as soon as `signal` aborts.
 * Only the awaiting caller is suspended.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new JobCancelledError('Cancelled while waiting.'));
    }
    if (ms <= 0) {
        return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new JobCancelledError('Cancelled while waiting.'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
