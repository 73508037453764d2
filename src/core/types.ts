/**
 * Asset descriptor, delta and runtime state types.
 * @module core/types
 */

/** Widget kinds understood by the engine. */
export type AssetKind = 'bar' | 'text' | 'image';

/** Side a bar grows from; `left` mirrors the bar around its anchor. */
export type Orientation = 'left' | 'right';

/** Position and requested size. Width/height `<= 0` mean natural size. */
export type Geometry = {
    x: number;
    y: number;
    width: number;
    height: number;
};

/** Where a widget's text comes from. */
export type TextBinding = {
    /** Single text channel, `-1` when unbound. */
    index: number;
    /** Ordered text channels concatenated before falling back to `index`. */
    indices: number[];
    /** Join `indices` with a space instead of a newline. */
    inline: boolean;
    /** Static fallback text. */
    label: string;
};

/** Background palette reference. */
export type Background = {
    /** Palette index, or `none` for a transparent background. */
    style: number | 'none';
    /** Opacity percent overriding the palette, or `inherit`. */
    opacity: number | 'inherit';
};

/** Value range mapped onto 0-100 percent. */
export type ValueRange = {
    min: number;
    max: number;
};

/** Fields every kind carries. */
export type AssetCommon = {
    /** Stable id (0-63). */
    id: number;
    enabled: boolean;
    geometry: Geometry;
    text: TextBinding;
    /** 0xRRGGBB. */
    textColor: number;
    background: Background;
};

/** Settings a bar draws with. */
export type BarSettings = {
    valueIndex: number;
    range: ValueRange;
    /** 0xRRGGBB. */
    barColor: number;
    orientation: Orientation;
    /** 0/1 draws a solid fill, more draws that many segments. */
    segments: number;
    roundedOutline: boolean;
};

/** Settings an image draws with. */
export type ImageSettings = {
    imagePath: string;
    /** Opacity percent (0-100). */
    imageOpacity: number;
};

/** Kind-specific settings of every kind, as one flat record. */
export type KindSettings = BarSettings & ImageSettings;

/**
 * Horizontal fill bar bound to a value channel. `retained` keeps the image
 * settings last sent, restored when the asset turns into an image.
 */
export type BarAsset = AssetCommon & BarSettings & {
    kind: 'bar';
    retained: ImageSettings;
};

/** Text widget composed from text channels and a label. */
export type TextAsset = AssetCommon & {
    kind: 'text';
    retained: KindSettings;
};

/** Static image widget. */
export type ImageAsset = AssetCommon & ImageSettings & {
    kind: 'image';
    retained: BarSettings;
};

/** Declarative configuration of one widget. */
export type AssetDescriptor = BarAsset | TextAsset | ImageAsset;

/**
 * Partial update for one asset as carried by `asset_updates` or a config
 * `assets` entry. Absent keys mean "no change".
 */
export type AssetDelta = {
    id?: number;
    enabled?: boolean;
    kind?: AssetKind;
    valueIndex?: number;
    textIndex?: number;
    textIndices?: number[];
    textInline?: boolean;
    label?: string;
    x?: number;
    y?: number;
    width?: number;
    height?: number;
    min?: number;
    max?: number;
    barColor?: number;
    textColor?: number;
    background?: number;
    backgroundOpacity?: number;
    imageOpacity?: number;
    segments?: number;
    roundedOutline?: boolean;
    orientation?: Orientation;
    imagePath?: string;
};

/** Which renderer work a delta requires. */
export type InvalidationFlags = {
    restyle: boolean;
    relayout: boolean;
    rerange: boolean;
    recreate: boolean;
    textChange: boolean;
};

/** Opaque value owned by the renderer. */
export type RenderHandle = unknown;

/** Last values pushed to the renderer for one asset. */
export type AssetRuntimeState = {
    /** Last pushed percent, `-1` when unset. */
    lastPercent: number;
    /** Last pushed composed text. */
    lastText: string;
    /** Renderer handle, `undefined` when no visual exists. */
    handle: RenderHandle | undefined;
    /** Flags raised since the last flush. */
    pending: InvalidationFlags;
    /** `enabled` flipped since the last flush. */
    enabledChanged: boolean;
};

/** Splash screen shown for a while after load or reload. */
export type SplashDescriptor = {
    enabled: boolean;
    durationMs: number;
    asset: ImageAsset;
};
