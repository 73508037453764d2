/**
 * Loop timing statistics and the stats text.
 * @module runtime/stats
 */
import type {ChannelStore} from '../core/ChannelStore';

/** Interval between two stats reports (ms). */
export const STATS_INTERVAL_MS = 250;
/** Channels listed when the channel dump is on. */
export const STATS_DUMP_CHANNELS = 8;

/** Timings of one loop iteration (ms). */
export type IterationTiming = {
    workMs: number;
    loopMs: number;
    idleMs: number;
};

export type StatsSnapshot = IterationTiming & {
    fps: number;
};

/** What the stats text describes besides timings. */
export type StatsContext = {
    width: number;
    height: number;
    osdX: number;
    osdY: number;
    activeAssets: number;
    totalAssets: number;
    /** Dump the first channels when given. */
    channels?: Pick<ChannelStore, 'getValue' | 'getText'>;
};

/** Render the stats text. */
export const formatStats = (snapshot: StatsSnapshot, context: StatsContext): string => {
    const lines = [
        `OSD ${context.width}x${context.height} @ ${context.osdX},${context.osdY}`,
        `Assets ${context.activeAssets}/${context.totalAssets}`,
        `FPS ${snapshot.fps} | work ${snapshot.workMs}ms | loop ${snapshot.loopMs}ms | idle ${snapshot.idleMs}ms`,
    ];
    const channels = context.channels;
    if (channels) {
        lines.push('UDP values:');
        for (let i = 0; i < STATS_DUMP_CHANNELS; i++) {
            lines.push(` v${i}=${channels.getValue(i).toFixed(2)}`);
        }
        lines.push('UDP texts:');
        for (let i = 0; i < STATS_DUMP_CHANNELS; i++) {
            lines.push(` t${i}=${channels.getText(i) || '-'}`);
        }
    }
    return lines.join('\n');
};

/** Counts iterations and keeps the timings of the last one. */
export class StatsTracker {
    private frames = 0;
    private windowStart: number;
    private lastReport: number;
    private last: IterationTiming = {workMs: 0, loopMs: 0, idleMs: 0};
    private fps = 0;

    constructor(
        private readonly now: () => number = Date.now,
        public readonly intervalMs: number = STATS_INTERVAL_MS,
    ) {
        this.windowStart = now();
        this.lastReport = this.windowStart;
    }

    public recordIteration(timing: IterationTiming): void {
        this.frames++;
        this.last = {
            workMs: Math.round(timing.workMs),
            loopMs: Math.round(timing.loopMs),
            idleMs: Math.round(timing.idleMs),
        };
    }

    /** `true` once the report interval has elapsed. */
    public shouldReport(): boolean {
        return this.now() - this.lastReport >= this.intervalMs;
    }

    /** Close the FPS window and return the current figures. */
    public snapshot(): StatsSnapshot {
        const now = this.now();
        const elapsed = now - this.windowStart;
        if (elapsed > 0) {
            this.fps = Math.floor((this.frames * 1000) / elapsed);
            this.frames = 0;
            this.windowStart = now;
        }
        this.lastReport = now;
        return {...this.last, fps: this.fps};
    }

    public report(context: StatsContext): string {
        return formatStats(this.snapshot(), context);
    }

    public reset(): void {
        this.frames = 0;
        this.fps = 0;
        this.windowStart = this.now();
        this.lastReport = this.windowStart;
        this.last = {workMs: 0, loopMs: 0, idleMs: 0};
    }
}
