/**
 * Local telemetry sources feeding the local channel range.
 * @module runtime/telemetry
 */
import {loadavg} from 'os';

import type {ChannelSample, ChannelStore} from '../core/ChannelStore';
import type {Logger} from '../core/logger';
import {CHANNEL_COUNT, LOCAL_CHANNEL_BASE} from '../wire/constants';

/** One reading for a local channel. */
export type TelemetrySample = {
    channel: number;
    value: ChannelSample;
};

/**
 * Something that produces readings. `poll` is called until it returns
 * `undefined` once per polling round.
 */
export type TelemetrySource = {
    readonly name: string;
    poll(): TelemetrySample | undefined;
};

export type TelemetryPollerOptions = {
    /** Minimum time between two rounds (ms). Defaults to 1000. */
    minIntervalMs?: number;
    /** Upper bound of samples taken from one source per round. */
    maxSamplesPerSource?: number;
    now?: () => number;
    logger?: Logger;
};

/** Drains every source at most once per interval into the channel store. */
export class TelemetryPoller {
    public readonly minIntervalMs: number;
    private readonly maxSamplesPerSource: number;
    private readonly now: () => number;
    private readonly logger: Logger;
    private lastPoll: number | undefined;

    constructor(
        private readonly sources: readonly TelemetrySource[],
        {minIntervalMs = 1000, maxSamplesPerSource = 16, now = Date.now, logger = console}: TelemetryPollerOptions = {},
    ) {
        if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
            throw new RangeError(`Telemetry interval must be >= 0 ms, got ${minIntervalMs}`);
        }
        this.minIntervalMs = minIntervalMs;
        this.maxSamplesPerSource = maxSamplesPerSource;
        this.now = now;
        this.logger = logger;
    }

    public isDue(): boolean {
        if (this.sources.length === 0) return false;
        return this.lastPoll === undefined || this.now() - this.lastPoll >= this.minIntervalMs;
    }

    /**
     * Run a polling round when due.
     * @returns `true` when a channel changed.
     */
    public pollDue(channels: Pick<ChannelStore, 'applyLocal'>): boolean {
        if (!this.isDue()) return false;
        this.lastPoll = this.now();
        let changed = false;
        for (const source of this.sources) {
            for (let i = 0; i < this.maxSamplesPerSource; i++) {
                const sample = source.poll();
                if (!sample) break;
                if (sample.channel < LOCAL_CHANNEL_BASE || sample.channel >= CHANNEL_COUNT) {
                    this.logger.debug(`Telemetry source ${source.name} wrote outside the local range: ${sample.channel}`);
                    continue;
                }
                if (channels.applyLocal(sample.channel, sample.value)) changed = true;
            }
        }
        return changed;
    }
}

/**
 * System load: the 1-minute average as a value and all three averages as
 * text, both on one channel.
 */
export class LoadAverageSource implements TelemetrySource {
    public readonly name = 'loadavg';
    private queue: TelemetrySample[] = [];
    private roundDone = false;

    constructor(
        private readonly channel: number = LOCAL_CHANNEL_BASE,
        private readonly read: () => number[] = loadavg,
    ) {}

    public poll(): TelemetrySample | undefined {
        if (this.queue.length === 0) {
            if (this.roundDone) {
                this.roundDone = false;
                return undefined;
            }
            const [one = 0, five = 0, fifteen = 0] = this.read();
            this.queue = [
                {channel: this.channel, value: one},
                {channel: this.channel, value: `${one.toFixed(2)} ${five.toFixed(2)} ${fifteen.toFixed(2)}`},
            ];
            this.roundDone = true;
        }
        return this.queue.shift();
    }
}
