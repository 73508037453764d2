/**
 * Push pacing: coalesces bursts of changes into one flush per window.
 * @module runtime/PushScheduler
 */

/** Minimum interval between two flushes (ms). */
export const DEFAULT_COALESCING_WINDOW_MS = 32;
/** Socket wait when nothing is pending (ms). */
export const DEFAULT_IDLE_CAP_MS = 100;

export type PushSchedulerOptions = {
    coalescingWindowMs?: number;
    idleCapMs?: number;
    /** Clock in milliseconds. Defaults to `Date.now`. */
    now?: () => number;
};

/** Scheduler state as observed between iterations. */
export type PendingFlush = {
    hasPending: boolean;
    /** Time of the last push, `undefined` before the first one. */
    lastPushTime: number | undefined;
    coalescingWindow: number;
};

export class PushScheduler {
    public readonly coalescingWindowMs: number;
    private idleCapMs: number;
    private readonly now: () => number;
    private dirty = false;
    private lastPushTime: number | undefined;

    constructor({
                    coalescingWindowMs = DEFAULT_COALESCING_WINDOW_MS,
                    idleCapMs = DEFAULT_IDLE_CAP_MS,
                    now = Date.now,
                }: PushSchedulerOptions = {}) {
        if (!Number.isFinite(coalescingWindowMs) || coalescingWindowMs < 0) {
            throw new RangeError(`Coalescing window must be >= 0 ms, got ${coalescingWindowMs}`);
        }
        this.coalescingWindowMs = coalescingWindowMs;
        this.idleCapMs = PushScheduler.checkIdleCap(idleCapMs);
        this.now = now;
    }

    /** Idle socket wait in ms. */
    public get idleCap(): number {
        return this.idleCapMs;
    }

    public setIdleCap(idleCapMs: number): void {
        this.idleCapMs = PushScheduler.checkIdleCap(idleCapMs);
    }

    /** Record that something changed and needs a flush. */
    public markDirty(): void {
        this.dirty = true;
    }

    public isDirty(): boolean {
        return this.dirty;
    }

    /** `true` when dirty and the coalescing window has elapsed. */
    public shouldPush(): boolean {
        return this.dirty && this.remaining() === 0;
    }

    /** Record a flush: clears dirty and restarts the window. */
    public recordPush(): void {
        this.dirty = false;
        this.lastPushTime = this.now();
    }

    /** How long the next socket wait may block (ms). */
    public nextWait(): number {
        if (!this.dirty) return this.idleCapMs;
        return Math.min(this.idleCapMs, this.remaining());
    }

    public snapshot(): PendingFlush {
        return {hasPending: this.dirty, lastPushTime: this.lastPushTime, coalescingWindow: this.coalescingWindowMs};
    }

    private remaining(): number {
        if (this.lastPushTime === undefined) return 0;
        const elapsed = this.now() - this.lastPushTime;
        return Math.max(0, this.coalescingWindowMs - elapsed);
    }

    private static checkIdleCap(idleCapMs: number): number {
        if (!Number.isFinite(idleCapMs) || idleCapMs <= 0) {
            throw new RangeError(`Idle cap must be > 0 ms, got ${idleCapMs}`);
        }
        return idleCapMs;
    }
}
