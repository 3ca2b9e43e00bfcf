export class AbortError extends Error {
    constructor(message: string = 'Operation aborted') {
        super(message);
        this.name = 'AbortError';
    }
}

export function isAbortError(error: unknown): error is AbortError {
    return error instanceof AbortError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Resolve after `ms`, or reject with AbortError as soon as `signal` aborts.
 * Uses the global timer so fake timers in tests can drive it.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortError());
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortError());
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
