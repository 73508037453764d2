/**
 * Overlay datagram decoder.
 * @module wire/decoder
 */
import type {AssetDelta, AssetKind, Orientation} from '../core/types';
import {EXTERNAL_CHANNELS, MAX_IMAGE_PATH_LENGTH, MAX_LABEL_LENGTH, MAX_TEXT_INDICES, MAX_TEXT_LENGTH} from './constants';
import {FieldScanner, readNull, readNumber, readString, type ReadResult} from './scanner';

/** One positional `values` entry: a number, `""` (reset to 0) or `null` (keep). */
export type ValueEntry = number | '' | null;

/** One positional `texts` entry: a string or `null` (keep). */
export type TextEntry = string | null;

/** Delta addressed to one asset id. */
export type AssetUpdate = AssetDelta & {id: number};

/** Fields recovered from one datagram. Absent fields mean "no change". */
export type DecodedDatagram = {
    values?: ValueEntry[];
    texts?: TextEntry[];
    assetUpdates?: AssetUpdate[];
    timestampMs?: number;
};

const readValueEntry = (bytes: Uint8Array, pos: number, end: number): ReadResult<ValueEntry> | undefined => {
    const nil = readNull(bytes, pos, end);
    if (nil) return nil;
    const str = readString(bytes, pos, end, MAX_TEXT_LENGTH);
    if (str) {
        // Only the empty string carries meaning in a numeric slot.
        return {value: str.value === '' ? '' : null, next: str.next};
    }
    return readNumber(bytes, pos, end);
};

const readTextEntry = (bytes: Uint8Array, pos: number, end: number): ReadResult<TextEntry> | undefined =>
    readNull(bytes, pos, end) ?? readString(bytes, pos, end, MAX_TEXT_LENGTH);

/** Map a wire kind name; unknown names fall back to `bar`. */
export const parseAssetKind = (name: string): AssetKind => {
    if (name === 'text') return 'text';
    if (name === 'image') return 'image';
    return 'bar';
};

/** Map a wire orientation name, `undefined` for anything else. */
export const parseOrientation = (name: string): Orientation | undefined => {
    if (name === 'left') return 'left';
    if (name === 'right') return 'right';
    return undefined;
};

/**
 * Read the asset fields of one object. Only keys that are present and well
 * formed end up in the delta; values are not clamped here.
 */
export const decodeAssetDelta = (obj: FieldScanner): AssetDelta => {
    const delta: AssetDelta = {};

    const id = obj.int('id');
    if (id !== undefined) delta.id = id;

    const enabled = obj.bool('enabled') ?? obj.bool('enable');
    if (enabled !== undefined) delta.enabled = enabled;

    const type = obj.string('type', 16);
    if (type !== undefined) delta.kind = parseAssetKind(type);

    const valueIndex = obj.int('value_index');
    if (valueIndex !== undefined) delta.valueIndex = valueIndex;

    const textIndex = obj.int('text_index');
    if (textIndex !== undefined) delta.textIndex = textIndex;

    const textIndices = obj.intArray('text_indices', MAX_TEXT_INDICES);
    if (textIndices !== undefined) delta.textIndices = textIndices;

    const textInline = obj.bool('text_inline');
    if (textInline !== undefined) delta.textInline = textInline;

    const label = obj.string('label', MAX_LABEL_LENGTH);
    if (label !== undefined) delta.label = label;

    const x = obj.int('x');
    if (x !== undefined) delta.x = x;
    const y = obj.int('y');
    if (y !== undefined) delta.y = y;
    const width = obj.int('width');
    if (width !== undefined) delta.width = width;
    const height = obj.int('height');
    if (height !== undefined) delta.height = height;

    const min = obj.float('min');
    if (min !== undefined) delta.min = min;
    const max = obj.float('max');
    if (max !== undefined) delta.max = max;

    const barColor = obj.int('bar_color');
    if (barColor !== undefined) delta.barColor = barColor;
    const textColor = obj.int('text_color');
    if (textColor !== undefined) delta.textColor = textColor;

    const background = obj.int('background');
    if (background !== undefined) delta.background = background;
    const backgroundOpacity = obj.int('background_opacity');
    if (backgroundOpacity !== undefined) delta.backgroundOpacity = backgroundOpacity;
    const imageOpacity = obj.int('image_opacity');
    if (imageOpacity !== undefined) delta.imageOpacity = imageOpacity;

    const segments = obj.int('segments');
    if (segments !== undefined) delta.segments = segments;

    const roundedOutline = obj.bool('rounded_outline');
    if (roundedOutline !== undefined) delta.roundedOutline = roundedOutline;

    const orientation = obj.string('orientation', 16);
    const parsedOrientation = orientation === undefined ? undefined : parseOrientation(orientation);
    if (parsedOrientation !== undefined) delta.orientation = parsedOrientation;

    const imagePath = obj.string('image_path', MAX_IMAGE_PATH_LENGTH) ?? obj.string('source', MAX_IMAGE_PATH_LENGTH);
    if (imagePath !== undefined) delta.imagePath = imagePath;

    return delta;
};

/**
 * Decode one datagram. Never throws: malformed or truncated parts are simply
 * missing from the result.
 */
export const decodeDatagram = (bytes: Uint8Array): DecodedDatagram => {
    const root = FieldScanner.root(bytes);
    if (!root) return {};

    const decoded: DecodedDatagram = {};

    const values = root.array('values', EXTERNAL_CHANNELS, readValueEntry);
    if (values !== undefined) decoded.values = values;

    const texts = root.array('texts', EXTERNAL_CHANNELS, readTextEntry);
    if (texts !== undefined) decoded.texts = texts;

    const objects = root.objects('asset_updates');
    if (objects !== undefined) {
        const updates: AssetUpdate[] = [];
        for (const obj of objects) {
            const {id, ...rest} = decodeAssetDelta(obj);
            if (id === undefined || id < 0) continue;
            updates.push({...rest, id});
        }
        decoded.assetUpdates = updates;
    }

    const timestampMs = root.int('timestamp_ms');
    if (timestampMs !== undefined) decoded.timestampMs = timestampMs;

    return decoded;
};

/** `true` when the datagram carries channel data or asset updates. */
export const hasPayload = (decoded: DecodedDatagram): boolean =>
    (decoded.values?.length ?? 0) > 0 ||
    (decoded.texts?.length ?? 0) > 0 ||
    (decoded.assetUpdates?.length ?? 0) > 0;
