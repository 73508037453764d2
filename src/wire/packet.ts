/**
 * Overlay datagram builder.
 * @module wire/packet
 */
import {OverlayError} from '../core/errors';
import {EXTERNAL_CHANNELS, MAX_PAYLOAD} from './constants';
import type {AssetUpdate, TextEntry, ValueEntry} from './decoder';

/** Fields of one datagram. Omitted fields are left out of the payload. */
export type DatagramOptions = {
    /** Positional values; `null` keeps a channel, `""` resets it to 0. */
    values?: ValueEntry[];
    /** Positional texts; `null` keeps a channel. */
    texts?: TextEntry[];
    /** Per-asset deltas. */
    assetUpdates?: AssetUpdate[];
    /** Advisory send time. */
    timestampMs?: number;
};

const number = (value: number): string => (Number.isFinite(value) ? String(value) : '0');
const int = (value: number): string => String(Math.trunc(Number.isFinite(value) ? value : 0));
const str = (value: string): string => JSON.stringify(value);

const encodeValue = (entry: ValueEntry): string => {
    if (entry === null) return 'null';
    if (entry === '') return '""';
    return number(entry);
};

const encodeText = (entry: TextEntry): string => (entry === null ? 'null' : str(entry));

/** Serialize one asset delta with `id` first and only the fields it sets. */
export const encodeAssetUpdate = (update: AssetUpdate): string => {
    const parts: string[] = [`"id":${int(update.id)}`];
    if (update.enabled !== undefined) parts.push(`"enabled":${update.enabled}`);
    if (update.kind !== undefined) parts.push(`"type":${str(update.kind)}`);
    if (update.valueIndex !== undefined) parts.push(`"value_index":${int(update.valueIndex)}`);
    if (update.textIndex !== undefined) parts.push(`"text_index":${int(update.textIndex)}`);
    if (update.textIndices !== undefined) parts.push(`"text_indices":[${update.textIndices.map(int).join(',')}]`);
    if (update.textInline !== undefined) parts.push(`"text_inline":${update.textInline}`);
    if (update.label !== undefined) parts.push(`"label":${str(update.label)}`);
    if (update.orientation !== undefined) parts.push(`"orientation":${str(update.orientation)}`);
    if (update.x !== undefined) parts.push(`"x":${int(update.x)}`);
    if (update.y !== undefined) parts.push(`"y":${int(update.y)}`);
    if (update.width !== undefined) parts.push(`"width":${int(update.width)}`);
    if (update.height !== undefined) parts.push(`"height":${int(update.height)}`);
    if (update.min !== undefined) parts.push(`"min":${number(update.min)}`);
    if (update.max !== undefined) parts.push(`"max":${number(update.max)}`);
    if (update.barColor !== undefined) parts.push(`"bar_color":${int(update.barColor)}`);
    if (update.textColor !== undefined) parts.push(`"text_color":${int(update.textColor)}`);
    if (update.background !== undefined) parts.push(`"background":${int(update.background)}`);
    if (update.backgroundOpacity !== undefined) parts.push(`"background_opacity":${int(update.backgroundOpacity)}`);
    if (update.imageOpacity !== undefined) parts.push(`"image_opacity":${int(update.imageOpacity)}`);
    if (update.segments !== undefined) parts.push(`"segments":${int(update.segments)}`);
    if (update.roundedOutline !== undefined) parts.push(`"rounded_outline":${update.roundedOutline}`);
    if (update.imagePath !== undefined) parts.push(`"image_path":${str(update.imagePath)}`);
    return `{${parts.join(',')}}`;
};

/** Serialize a datagram to its JSON text. */
export const encodeDatagram = (options: DatagramOptions): string => {
    const fields: string[] = [];
    if (options.values && options.values.length > 0) {
        if (options.values.length > EXTERNAL_CHANNELS) {
            throw new RangeError(`At most ${EXTERNAL_CHANNELS} values per datagram, got ${options.values.length}`);
        }
        fields.push(`"values":[${options.values.map(encodeValue).join(',')}]`);
    }
    if (options.texts && options.texts.length > 0) {
        if (options.texts.length > EXTERNAL_CHANNELS) {
            throw new RangeError(`At most ${EXTERNAL_CHANNELS} texts per datagram, got ${options.texts.length}`);
        }
        fields.push(`"texts":[${options.texts.map(encodeText).join(',')}]`);
    }
    if (options.assetUpdates && options.assetUpdates.length > 0) {
        fields.push(`"asset_updates":[${options.assetUpdates.map(encodeAssetUpdate).join(',')}]`);
    }
    if (options.timestampMs !== undefined) {
        fields.push(`"timestamp_ms":${int(options.timestampMs)}`);
    }
    return `{${fields.join(',')}}`;
};

/**
 * Build a datagram buffer.
 * @throws OverlayError `PAYLOAD_TOO_LARGE` when the result exceeds the protocol limit.
 */
export const buildDatagram = (options: DatagramOptions): Buffer => {
    const buffer = Buffer.from(encodeDatagram(options), 'utf8');
    if (buffer.length > MAX_PAYLOAD) {
        throw new OverlayError({
            message: `Datagram is ${buffer.length} bytes, limit is ${MAX_PAYLOAD}`,
            domain: 'wire',
            code: 'PAYLOAD_TOO_LARGE',
            details: {length: buffer.length, limit: MAX_PAYLOAD},
        });
    }
    return buffer;
};
