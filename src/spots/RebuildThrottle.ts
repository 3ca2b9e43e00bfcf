/**
 * Runs a callback at most once per interval. A request inside the interval
 * schedules a single trailing run; requests that arrive while one is pending
 * are folded into it.
 */
export class RebuildThrottle {
    private readonly run: () => void;
    private readonly minIntervalMs: number;
    private readonly now: () => number;
    private lastRun: number = Number.NEGATIVE_INFINITY;
    private timer: NodeJS.Timeout | null = null;

    constructor(run: () => void, minIntervalMs: number = 2000, now: () => number = Date.now) {
        this.run = run;
        this.minIntervalMs = minIntervalMs;
        this.now = now;
    }

    public request(): void {
        if (this.timer) return;

        const wait = this.lastRun + this.minIntervalMs - this.now();
        if (wait <= 0) {
            this.fire();
            return;
        }

        this.timer = setTimeout(() => {
            this.timer = null;
            this.fire();
        }, wait);
    }

    public isPending(): boolean {
        return this.timer !== null;
    }

    public cancel(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private fire(): void {
        this.lastRun = this.now();
        this.run();
    }
}
