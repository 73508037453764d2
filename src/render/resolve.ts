/**
 * Descriptor to renderer payload mapping.
 * @module render/resolve
 */
import {BACKGROUND_PALETTE} from '../core/descriptor';
import type {AssetDescriptor, Background, BarAsset} from '../core/types';
import {percentToAlpha} from '../core/utils';
import {segmentLayout} from './geometry';
import type {AssetGeometry, AssetStyle, ResolvedBackground} from './types';

/** Natural bar width when none is configured. */
export const NATURAL_BAR_WIDTH = 320;
/** Natural width of a bar with a rounded outline. */
export const NATURAL_OUTLINED_BAR_WIDTH = 200;
/** Inner padding of a rounded outline. */
export const OUTLINE_PADDING = 6;

/** Resolve a palette reference to a color and alpha. */
export const resolveBackground = (background: Background): ResolvedBackground | null => {
    if (background.style === 'none') return null;
    const entry = BACKGROUND_PALETTE[background.style];
    if (!entry) return null;
    const opacity = background.opacity === 'inherit' ? entry.opacity : background.opacity;
    return {color: entry.color, alpha: percentToAlpha(opacity)};
};

/** Width of the fill track of a bar, inside any outline padding. */
export const barTrackWidth = (bar: BarAsset): number => {
    const natural = bar.roundedOutline ? NATURAL_OUTLINED_BAR_WIDTH : NATURAL_BAR_WIDTH;
    const width = bar.geometry.width > 0 ? bar.geometry.width : natural;
    return Math.max(0, width - (bar.roundedOutline ? OUTLINE_PADDING * 2 : 0));
};

/**
 * Geometry for a relayout. Segmented bars carry a fresh segment layout so
 * every relayout repaints segments from the current width and fill.
 */
export const resolveGeometry = (descriptor: AssetDescriptor, percent: number): AssetGeometry => {
    const {x, y, width, height} = descriptor.geometry;
    if (descriptor.kind !== 'bar') return {x, y, width, height};
    const geometry: AssetGeometry = {x, y, width, height, orientation: descriptor.orientation};
    if (descriptor.segments > 1) {
        geometry.segments = segmentLayout(barTrackWidth(descriptor), descriptor.segments, Math.max(0, percent));
    }
    return geometry;
};

/** Style for a restyle. */
export const resolveStyle = (descriptor: AssetDescriptor): AssetStyle => {
    const base = {
        kind: descriptor.kind,
        textColor: descriptor.textColor,
        background: resolveBackground(descriptor.background),
    };
    switch (descriptor.kind) {
        case 'bar':
            return {...base, barColor: descriptor.barColor, roundedOutline: descriptor.roundedOutline};
        case 'image':
            return {...base, imageAlpha: percentToAlpha(descriptor.imageOpacity)};
        case 'text':
            return base;
    }
};
