/**
 * Numeric and text channel store.
 * @module core/ChannelStore
 */
import {CHANNEL_COUNT, EXTERNAL_CHANNELS, LOCAL_CHANNEL_BASE, MAX_TEXT_LENGTH} from '../wire/constants';
import type {TextEntry, ValueEntry} from '../wire/decoder';
import {truncateText} from './utils';

/** A locally computed channel sample. */
export type ChannelSample = number | string;

/**
 * Fixed-size value/text channels with dirty tracking.
 * Indices `[0, EXTERNAL_CHANNELS)` are fed by datagrams, the rest by local sources.
 */
export class ChannelStore {
    /** Numeric channels. Unset channels read `0`. */
    public readonly values: Float64Array;
    /** Text channels. Unset channels read `""`. */
    public readonly texts: string[];
    private dirty = false;

    constructor() {
        this.values = new Float64Array(CHANNEL_COUNT);
        this.texts = new Array<string>(CHANNEL_COUNT).fill('');
    }

    /** Number of channels. */
    public get size(): number {
        return CHANNEL_COUNT;
    }

    /**
     * Set one numeric channel. Out-of-range indices are ignored.
     * @returns `true` when the stored value changed.
     */
    public setValue(index: number, value: number): boolean {
        if (!this.inRange(index) || !Number.isFinite(value)) return false;
        if (Object.is(this.values[index], value)) return false;
        this.values[index] = value;
        this.dirty = true;
        return true;
    }

    /**
     * Set one text channel, truncated to the channel capacity.
     * Out-of-range indices are ignored.
     * @returns `true` when the stored text changed.
     */
    public setText(index: number, text: string): boolean {
        if (!this.inRange(index)) return false;
        const next = truncateText(text, MAX_TEXT_LENGTH);
        if (this.texts[index] === next) return false;
        this.texts[index] = next;
        this.dirty = true;
        return true;
    }

    /** @returns The value of a channel, `0` when out of range. */
    public getValue(index: number): number {
        return this.inRange(index) ? (this.values[index] ?? 0) : 0;
    }

    /** @returns The text of a channel, `""` when out of range. */
    public getText(index: number): string {
        return this.inRange(index) ? (this.texts[index] ?? '') : '';
    }

    /**
     * Apply decoded `values` positionally to the external range.
     * `null` keeps a channel, `""` resets it to `0`.
     * @returns `true` when any channel changed.
     */
    public applyValues(entries: readonly ValueEntry[]): boolean {
        let changed = false;
        const count = Math.min(entries.length, EXTERNAL_CHANNELS);
        for (let i = 0; i < count; i++) {
            const entry = entries[i];
            if (entry === null || entry === undefined) continue;
            if (this.setValue(i, entry === '' ? 0 : entry)) changed = true;
        }
        return changed;
    }

    /**
     * Apply decoded `texts` positionally to the external range.
     * `null` keeps a channel, `""` clears it.
     * @returns `true` when any channel changed.
     */
    public applyTexts(entries: readonly TextEntry[]): boolean {
        let changed = false;
        const count = Math.min(entries.length, EXTERNAL_CHANNELS);
        for (let i = 0; i < count; i++) {
            const entry = entries[i];
            if (entry === null || entry === undefined) continue;
            if (this.setText(i, entry)) changed = true;
        }
        return changed;
    }

    /**
     * Write a locally computed sample. Numbers go to the value channel,
     * strings to the text channel. Indices outside the local range are ignored.
     * @returns `true` when the channel changed.
     */
    public applyLocal(index: number, sample: ChannelSample): boolean {
        if (!Number.isInteger(index) || index < LOCAL_CHANNEL_BASE || index >= CHANNEL_COUNT) return false;
        return typeof sample === 'number' ? this.setValue(index, sample) : this.setText(index, sample);
    }

    /** Reset every channel to its unset state. */
    public clear(): void {
        this.values.fill(0);
        this.texts.fill('');
        this.dirty = true;
    }

    /**
     * Read and reset the dirty flag.
     * @returns `true` if any channel changed since last consume.
     */
    public consumeDirty(): boolean {
        const wasDirty = this.dirty;
        this.dirty = false;
        return wasDirty;
    }

    /** @returns `true` when channels changed since the last consume. */
    public isDirty(): boolean {
        return this.dirty;
    }

    private inRange(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < CHANNEL_COUNT;
    }
}
