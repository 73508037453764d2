/**
 * Asset descriptor defaults, kind conversion and the background palette.
 * @module core/descriptor
 */
import {CHANNEL_COUNT} from '../wire/constants';
import {clampInt} from './utils';
import type {
    AssetCommon,
    AssetDescriptor,
    AssetKind,
    AssetRuntimeState,
    BarAsset,
    BarSettings,
    ImageAsset,
    ImageSettings,
    InvalidationFlags,
    KindSettings,
    SplashDescriptor,
} from './types';

/** One background palette entry. */
export type PaletteEntry = {
    /** 0xRRGGBB. */
    color: number;
    /** Opacity percent. */
    opacity: number;
};

/** Fixed background palette addressed by `background`. */
export const BACKGROUND_PALETTE: readonly PaletteEntry[] = [
    {color: 0x000000, opacity: 0},
    {color: 0x000000, opacity: 50},
    {color: 0xffffff, opacity: 50},
    {color: 0x111111, opacity: 70},
    {color: 0x222222, opacity: 90},
    {color: 0x2266cc, opacity: 60},
    {color: 0x009688, opacity: 60},
    {color: 0x4caf50, opacity: 60},
    {color: 0xff9800, opacity: 70},
    {color: 0xe91e63, opacity: 60},
    {color: 0x9c27b0, opacity: 70},
];

export const DEFAULT_BAR_COLOR = 0x2266cc;
export const DEFAULT_TEXT_COLOR = 0xffffff;

/** Flags with nothing raised. */
export const noFlags = (): InvalidationFlags => ({
    restyle: false,
    relayout: false,
    rerange: false,
    recreate: false,
    textChange: false,
});

/** `true` when at least one flag is raised. */
export const anyFlag = (flags: InvalidationFlags): boolean =>
    flags.restyle || flags.relayout || flags.rerange || flags.recreate || flags.textChange;

/** Fresh runtime state with no visual. */
export const createRuntimeState = (): AssetRuntimeState => ({
    lastPercent: -1,
    lastText: '',
    handle: undefined,
    pending: noFlags(),
    enabledChanged: false,
});

/** Kind-specific defaults for an id. */
export const defaultKindSettings = (id: number): KindSettings => ({
    valueIndex: clampInt(id, 0, CHANNEL_COUNT - 1),
    range: {min: 0, max: 1},
    barColor: DEFAULT_BAR_COLOR,
    orientation: 'right',
    segments: 0,
    roundedOutline: false,
    imagePath: '',
    imageOpacity: 100,
});

const barSettings = (settings: BarSettings): BarSettings => ({
    valueIndex: settings.valueIndex,
    range: {...settings.range},
    barColor: settings.barColor,
    orientation: settings.orientation,
    segments: settings.segments,
    roundedOutline: settings.roundedOutline,
});

const imageSettings = (settings: ImageSettings): ImageSettings => ({
    imagePath: settings.imagePath,
    imageOpacity: settings.imageOpacity,
});

/** Copy of the fields every kind carries. */
export const commonFields = (descriptor: AssetCommon): AssetCommon => ({
    id: descriptor.id,
    enabled: descriptor.enabled,
    geometry: {...descriptor.geometry},
    text: {...descriptor.text, indices: [...descriptor.text.indices]},
    textColor: descriptor.textColor,
    background: {...descriptor.background},
});

/** Every kind-specific setting of a descriptor, active and retained. */
export const kindSettings = (descriptor: AssetDescriptor): KindSettings => {
    switch (descriptor.kind) {
        case 'bar':
            return {...barSettings(descriptor), ...imageSettings(descriptor.retained)};
        case 'text':
            return {...barSettings(descriptor.retained), ...imageSettings(descriptor.retained)};
        case 'image':
            return {...barSettings(descriptor.retained), ...imageSettings(descriptor)};
    }
};

/** Assemble a descriptor of `kind`; settings the kind does not draw with are retained. */
export const withKindSettings = (common: AssetCommon, kind: AssetKind, settings: KindSettings): AssetDescriptor => {
    switch (kind) {
        case 'bar':
            return {...commonFields(common), kind, ...barSettings(settings), retained: imageSettings(settings)};
        case 'text':
            return {...commonFields(common), kind, retained: {...barSettings(settings), ...imageSettings(settings)}};
        case 'image':
            return {...commonFields(common), kind, ...imageSettings(settings), retained: barSettings(settings)};
    }
};

/**
 * Default descriptor for an id: an enabled bar stacked 60px below the
 * previous default, bound to the value channel with the same index.
 */
export const createDefaultDescriptor = (id: number): BarAsset => {
    const settings = defaultKindSettings(id);
    return {
        kind: 'bar',
        id,
        enabled: true,
        geometry: {x: 40, y: 60 + id * 60, width: 320, height: 32},
        text: {index: -1, indices: [], inline: false, label: ''},
        textColor: DEFAULT_TEXT_COLOR,
        background: {style: 'none', opacity: 'inherit'},
        ...barSettings(settings),
        retained: imageSettings(settings),
    };
};

/**
 * Convert a descriptor to another kind. Common fields carry over, the new
 * kind's settings come from the ones retained for it.
 */
export const convertKind = (descriptor: AssetDescriptor, kind: AssetKind): AssetDescriptor => {
    if (descriptor.kind === kind) return descriptor;
    return withKindSettings(descriptor, kind, kindSettings(descriptor));
};

/** Deep copy of a descriptor. */
export const cloneDescriptor = (descriptor: AssetDescriptor): AssetDescriptor =>
    withKindSettings(descriptor, descriptor.kind, kindSettings(descriptor));

/** Splash defaults: disabled, zero duration, an image at the default spot. */
export const createDefaultSplash = (): SplashDescriptor => {
    const {id, geometry, text, textColor, background} = createDefaultDescriptor(-1);
    const settings = defaultKindSettings(-1);
    const asset: ImageAsset = {
        kind: 'image',
        id,
        enabled: true,
        geometry,
        text,
        textColor,
        background,
        ...imageSettings(settings),
        retained: barSettings(settings),
    };
    return {enabled: false, durationMs: 0, asset};
};
