/**
 * Delta diffing: which invalidation flags a partial update raises.
 * @module core/reconcile
 */
import {CHANNEL_COUNT, MAX_IMAGE_PATH_LENGTH, MAX_LABEL_LENGTH, MAX_SEGMENTS, MAX_TEXT_INDICES} from '../wire/constants';
import {BACKGROUND_PALETTE, cloneDescriptor, convertKind, kindSettings, noFlags, withKindSettings} from './descriptor';
import type {AssetDelta, AssetDescriptor, InvalidationFlags} from './types';
import {clampInt, truncateText} from './utils';

/** Outcome of diffing one delta against a descriptor. */
export type DeltaResult = {
    /** Descriptor with every changed field applied. */
    descriptor: AssetDescriptor;
    /** Flags raised by the changed fields. */
    flags: InvalidationFlags;
    /** `enabled` differs from the previous descriptor. */
    enabledChanged: boolean;
};

const sameIndices = (a: readonly number[], b: readonly number[]): boolean =>
    a.length === b.length && a.every((value, i) => value === b[i]);

const toColor = (value: number): number => clampInt(value, 0, 0xffffffff);

/** Clamp a wire background index; `-1` (or below) means none. */
export const toBackgroundStyle = (value: number): number | 'none' => {
    const style = clampInt(value, -1, BACKGROUND_PALETTE.length - 1);
    return style < 0 ? 'none' : style;
};

/** OR two flag sets together. */
export const mergeFlags = (a: InvalidationFlags, b: InvalidationFlags): InvalidationFlags => ({
    restyle: a.restyle || b.restyle,
    relayout: a.relayout || b.relayout,
    rerange: a.rerange || b.rerange,
    recreate: a.recreate || b.recreate,
    textChange: a.textChange || b.textChange,
});

/**
 * Compare a delta with a descriptor. Only fields that differ are applied,
 * so a delta that repeats current state raises nothing. `type` is applied
 * first so the remaining fields land on the new kind. Settings of other kinds
 * are retained and raise their flags all the same.
 */
export const diffDelta = (current: AssetDescriptor, delta: AssetDelta): DeltaResult => {
    const flags = noFlags();
    let next = cloneDescriptor(current);

    if (delta.kind !== undefined && delta.kind !== next.kind) {
        next = convertKind(next, delta.kind);
        flags.recreate = true;
    }

    const geometry = next.geometry;
    if (delta.x !== undefined && delta.x !== geometry.x) {
        geometry.x = delta.x;
        flags.relayout = true;
    }
    if (delta.y !== undefined && delta.y !== geometry.y) {
        geometry.y = delta.y;
        flags.relayout = true;
    }
    if (delta.width !== undefined && delta.width !== geometry.width) {
        geometry.width = delta.width;
        flags.relayout = true;
        if (next.kind === 'text') flags.recreate = true;
    }
    if (delta.height !== undefined && delta.height !== geometry.height) {
        geometry.height = delta.height;
        flags.relayout = true;
        if (next.kind === 'text') flags.recreate = true;
    }

    const text = next.text;
    if (delta.textIndex !== undefined) {
        const index = clampInt(delta.textIndex, -1, CHANNEL_COUNT - 1);
        if (index !== text.index) {
            text.index = index;
            flags.textChange = true;
        }
    }
    if (delta.textIndices !== undefined) {
        const indices = delta.textIndices
            .slice(0, MAX_TEXT_INDICES)
            .map((index) => clampInt(index, 0, CHANNEL_COUNT - 1));
        if (!sameIndices(indices, text.indices)) {
            text.indices = indices;
            flags.textChange = true;
        }
    }
    if (delta.textInline !== undefined && delta.textInline !== text.inline) {
        text.inline = delta.textInline;
        flags.textChange = true;
    }
    if (delta.label !== undefined) {
        const label = truncateText(delta.label, MAX_LABEL_LENGTH);
        if (label !== text.label) {
            text.label = label;
            flags.textChange = true;
        }
    }

    if (delta.textColor !== undefined) {
        const color = toColor(delta.textColor);
        if (color !== next.textColor) {
            next.textColor = color;
            flags.restyle = true;
            flags.textChange = true;
        }
    }
    if (delta.background !== undefined) {
        const style = toBackgroundStyle(delta.background);
        if (style !== next.background.style) {
            next.background.style = style;
            flags.restyle = true;
        }
    }
    if (delta.backgroundOpacity !== undefined) {
        const opacity = clampInt(delta.backgroundOpacity, 0, 100);
        if (opacity !== next.background.opacity) {
            next.background.opacity = opacity;
            flags.restyle = true;
        }
    }

    // Kind-specific fields are stored whatever the current kind.
    const settings = kindSettings(next);
    if (delta.valueIndex !== undefined) {
        settings.valueIndex = clampInt(delta.valueIndex, 0, CHANNEL_COUNT - 1);
    }
    if (delta.min !== undefined && delta.min !== settings.range.min) {
        settings.range.min = delta.min;
        flags.rerange = true;
    }
    if (delta.max !== undefined && delta.max !== settings.range.max) {
        settings.range.max = delta.max;
        flags.rerange = true;
    }
    if (delta.barColor !== undefined) {
        const color = toColor(delta.barColor);
        if (color !== settings.barColor) {
            settings.barColor = color;
            if (next.kind !== 'text') flags.restyle = true;
        }
    }
    if (delta.orientation !== undefined && delta.orientation !== settings.orientation) {
        settings.orientation = delta.orientation;
        flags.relayout = true;
    }
    if (delta.segments !== undefined) {
        const segments = clampInt(delta.segments, 0, MAX_SEGMENTS);
        if (segments !== settings.segments) {
            settings.segments = segments;
            flags.relayout = true;
        }
    }
    if (delta.roundedOutline !== undefined && delta.roundedOutline !== settings.roundedOutline) {
        settings.roundedOutline = delta.roundedOutline;
        flags.recreate = true;
    }
    if (delta.imageOpacity !== undefined) {
        const opacity = clampInt(delta.imageOpacity, 0, 100);
        if (opacity !== settings.imageOpacity) {
            settings.imageOpacity = opacity;
            flags.restyle = true;
        }
    }
    if (delta.imagePath !== undefined) {
        const path = truncateText(delta.imagePath, MAX_IMAGE_PATH_LENGTH);
        if (path !== settings.imagePath) {
            settings.imagePath = path;
            flags.recreate = true;
        }
    }
    next = withKindSettings(next, next.kind, settings);

    let enabledChanged = false;
    if (delta.enabled !== undefined && delta.enabled !== next.enabled) {
        next.enabled = delta.enabled;
        enabledChanged = true;
    }

    return {descriptor: next, flags, enabledChanged};
};
