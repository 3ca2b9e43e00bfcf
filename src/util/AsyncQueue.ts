import { AbortError } from './abort';

interface Waiter<T> {
    resolve: (item: T) => void;
    reject: (error: Error) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Unbounded FIFO with an awaitable `take()`. Any number of producers may
 * `push()`; items are handed to waiting consumers in the order they waited.
 */
export class AsyncQueue<T> {
    private items: T[] = [];
    private waiters: Waiter<T>[] = [];

    public push(item: T): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            if (waiter.signal && waiter.onAbort) {
                waiter.signal.removeEventListener('abort', waiter.onAbort);
            }
            waiter.resolve(item);
            return;
        }
        this.items.push(item);
    }

    /**
     * Wait for the next item. An aborted wait rejects with AbortError and
     * consumes nothing.
     */
    public take(signal?: AbortSignal): Promise<T> {
        if (signal?.aborted) {
            return Promise.reject(new AbortError());
        }

        if (this.items.length > 0) {
            const item = this.items[0];
            this.items = this.items.slice(1);
            return Promise.resolve(item);
        }

        return new Promise<T>((resolve, reject) => {
            const waiter: Waiter<T> = { resolve, reject, signal };
            if (signal) {
                waiter.onAbort = () => {
                    this.waiters = this.waiters.filter(w => w !== waiter);
                    reject(new AbortError());
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            this.waiters.push(waiter);
        });
    }

    /** Drop every pending item and return what was dropped. */
    public clear(): T[] {
        const dropped = this.items;
        this.items = [];
        return dropped;
    }

    public get size(): number {
        return this.items.length;
    }

    public get pendingTakers(): number {
        return this.waiters.length;
    }
}
