/**
 * Renderer contract consumed by the reconciliation engine.
 * @module render/types
 */
import type {AssetDescriptor, AssetKind, Orientation, RenderHandle} from '../core/types';
import type {SegmentLayout} from './geometry';

/** Resolved background fill. */
export type ResolvedBackground = {
    /** 0xRRGGBB. */
    color: number;
    /** 0-255. */
    alpha: number;
};

/** Placement pushed on relayout. */
export type AssetGeometry = {
    x: number;
    y: number;
    /** Requested width, `<= 0` for natural size. */
    width: number;
    /** Requested height, `<= 0` for natural size. */
    height: number;
    /** Bars only. */
    orientation?: Orientation;
    /** Bars with more than one segment only. */
    segments?: SegmentLayout;
};

/** Style pushed on restyle. */
export type AssetStyle = {
    kind: AssetKind;
    textColor: number;
    /** `null` for a transparent background. */
    background: ResolvedBackground | null;
    /** Bars only. */
    barColor?: number;
    /** Bars only. */
    roundedOutline?: boolean;
    /** Images only, 0-255. */
    imageAlpha?: number;
};

/**
 * Widget toolkit adapter. The engine never looks inside a handle; it only
 * hands back what `create` returned.
 */
export type Renderer = {
    /** Build the visual for a descriptor; `undefined` when it cannot be built. */
    create(descriptor: Readonly<AssetDescriptor>): RenderHandle | undefined;
    /** Tear a visual down. */
    destroy(handle: RenderHandle): void;
    /** Show a 0-100 fill level. */
    setPercent(handle: RenderHandle, percent: number): void;
    /** Show a text (the widget text or the label of a bar/image). */
    setText(handle: RenderHandle, text: string): void;
    /** Move/resize a visual. */
    relayout(handle: RenderHandle, geometry: AssetGeometry): void;
    /** Recolor a visual. */
    restyle(handle: RenderHandle, style: AssetStyle): void;
};

/** One renderer call issued by a flush, tagged with the asset id. */
export type RenderOp =
    | {type: 'create'; id: number; kind: AssetKind}
    | {type: 'destroy'; id: number}
    | {type: 'relayout'; id: number; geometry: AssetGeometry}
    | {type: 'restyle'; id: number; style: AssetStyle}
    | {type: 'setPercent'; id: number; percent: number}
    | {type: 'setText'; id: number; text: string};
