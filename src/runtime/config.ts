/**
 * Overlay configuration file.
 *
 * Every field is optional and validated on its own. A field of the wrong
 * shape is treated as absent and its default applies.
 *
 * @module runtime/config
 */
import {readFileSync} from 'fs';
import {z} from 'zod';

import {createDefaultDescriptor, createDefaultSplash} from '../core/descriptor';
import {OverlayError} from '../core/errors';
import type {Logger} from '../core/logger';
import {diffDelta} from '../core/reconcile';
import type {AssetDelta, AssetDescriptor, SplashDescriptor} from '../core/types';
import {clampInt} from '../core/utils';
import {parseAssetKind} from '../wire/decoder';
import {MAX_ASSET_ID, MAX_ASSETS, MAX_TEXT_INDICES} from '../wire/constants';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const DEFAULT_SCREEN_WIDTH = 1280;
export const DEFAULT_SCREEN_HEIGHT = 720;
export const DEFAULT_IDLE_MS = 100;
export const MIN_IDLE_MS = 10;
export const MAX_IDLE_MS = 1000;
export const MAX_SPLASH_DURATION_MS = 60000;

/** Resolved overlay configuration. */
export type OverlayConfig = {
    /** Canvas size (px). */
    width: number;
    height: number;
    /** Canvas offset on the output (px). */
    osdX: number;
    osdY: number;
    /** Emit the stats line. */
    showStats: boolean;
    /** Idle socket wait (ms). */
    idleMs: number;
    /** Append channel contents to the stats line. */
    udpStats: boolean;
    assets: AssetDescriptor[];
    splash: SplashDescriptor;
};

const field = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

// Colors may be written as "0xRRGGBB" since JSON has no hex literals.
const hexString = z
    .string()
    .regex(/^0x[0-9a-f]+$/i)
    .transform((text) => Number.parseInt(text.slice(2), 16));

const intField = field(z.union([z.number().finite(), hexString]).transform((value) => Math.trunc(value)));
const floatField = field(z.number().finite());
const boolField = field(z.boolean());
const stringField = field(z.string());

const AssetEntrySchema = z.object({
    id:                 intField,
    enabled:            boolField,
    enable:             boolField,
    type:               stringField,
    value_index:        intField,
    text_index:         intField,
    text_indices:       field(z.array(z.number().finite()).transform((list) => list.slice(0, MAX_TEXT_INDICES).map(Math.trunc))),
    text_inline:        boolField,
    label:              stringField,
    x:                  intField,
    y:                  intField,
    width:              intField,
    height:             intField,
    min:                floatField,
    max:                floatField,
    bar_color:          intField,
    text_color:         intField,
    background:         intField,
    background_opacity: intField,
    image_opacity:      intField,
    segments:           intField,
    rounded_outline:    boolField,
    orientation:        field(z.enum(['left', 'right'])),
    image_path:         stringField,
    source:             stringField,
});

const SplashSchema = z.object({
    enabled:            boolField,
    duration_ms:        intField,
    x:                  intField,
    y:                  intField,
    width:              intField,
    height:             intField,
    background:         intField,
    background_opacity: intField,
    image_opacity:      intField,
    image_path:         stringField,
    source:             stringField,
});

export const ConfigSchema = z.object({
    width:        intField,
    height:       intField,
    osd_x:        intField,
    osd_y:        intField,
    show_stats:   boolField,
    udp_stats:    boolField,
    idle_ms:      intField,
    refresh_ms:   intField,
    bar_x:        intField,
    bar_y:        intField,
    bar_width:    intField,
    bar_height:   intField,
    bar_min:      floatField,
    bar_max:      floatField,
    bar_color:    intField,
    assets:       field(z.array(z.unknown())),
    splashscreen: field(z.record(z.string(), z.unknown())),
});

export type RawConfig = z.infer<typeof ConfigSchema>;
export type RawAssetEntry = z.infer<typeof AssetEntrySchema>;

/** Drop keys whose value is `undefined` so a delta only carries what was set. */
const compact = (delta: AssetDelta): AssetDelta => {
    const out: AssetDelta = {};
    for (const [key, value] of Object.entries(delta)) {
        if (value !== undefined) Object.assign(out, {[key]: value});
    }
    return out;
};

const toAssetDelta = (entry: RawAssetEntry): AssetDelta =>
    compact({
        enabled: entry.enabled ?? entry.enable,
        kind: entry.type === undefined ? undefined : parseAssetKind(entry.type),
        valueIndex: entry.value_index,
        textIndex: entry.text_index,
        textIndices: entry.text_indices,
        textInline: entry.text_inline,
        label: entry.label,
        x: entry.x,
        y: entry.y,
        width: entry.width,
        height: entry.height,
        min: entry.min,
        max: entry.max,
        barColor: entry.bar_color,
        textColor: entry.text_color,
        background: entry.background,
        backgroundOpacity: entry.background_opacity,
        imageOpacity: entry.image_opacity,
        segments: entry.segments,
        roundedOutline: entry.rounded_outline,
        orientation: entry.orientation,
        imagePath: entry.image_path || entry.source,
    });

/**
 * Build one asset from a config entry. Defaults follow the entry's position,
 * the id defaults to it as well.
 */
export const buildAsset = (entry: RawAssetEntry, position: number): AssetDescriptor => {
    const id = clampInt(entry.id ?? position, 0, MAX_ASSET_ID);
    const base: AssetDescriptor = {...createDefaultDescriptor(position), id};
    return diffDelta(base, toAssetDelta(entry)).descriptor;
};

const legacyAsset = (raw: RawConfig): AssetDescriptor =>
    diffDelta(
        createDefaultDescriptor(0),
        compact({
            x: raw.bar_x,
            y: raw.bar_y,
            width: raw.bar_width,
            height: raw.bar_height,
            min: raw.bar_min,
            max: raw.bar_max,
            barColor: raw.bar_color,
        }),
    ).descriptor;

const buildAssets = (raw: RawConfig, logger: Logger): AssetDescriptor[] => {
    if (raw.assets === undefined) return [legacyAsset(raw)];

    const assets: AssetDescriptor[] = [];
    for (const [position, item] of raw.assets.entries()) {
        if (assets.length >= MAX_ASSETS) {
            logger.warn(`Config lists more than ${MAX_ASSETS} assets, ignoring the rest`);
            break;
        }
        const parsed = AssetEntrySchema.safeParse(item);
        if (!parsed.success) {
            logger.warn(`Config asset #${position} is not an object, skipped`);
            continue;
        }
        const asset = buildAsset(parsed.data, assets.length);
        if (assets.some((existing) => existing.id === asset.id)) {
            logger.warn(`Config asset #${position} repeats id ${asset.id}, skipped`);
            continue;
        }
        assets.push(asset);
    }
    return assets.length > 0 ? assets : [createDefaultDescriptor(0)];
};

const buildSplash = (raw: RawConfig): SplashDescriptor => {
    const splash = createDefaultSplash();
    if (raw.splashscreen === undefined) return splash;
    const parsed = SplashSchema.parse(raw.splashscreen);

    if (parsed.enabled !== undefined) splash.enabled = parsed.enabled;
    if (parsed.duration_ms !== undefined) splash.durationMs = clampInt(parsed.duration_ms, 0, MAX_SPLASH_DURATION_MS);

    const next = diffDelta(
        splash.asset,
        compact({
            x: parsed.x,
            y: parsed.y,
            width: parsed.width,
            height: parsed.height,
            background: parsed.background,
            backgroundOpacity: parsed.background_opacity,
            imageOpacity: parsed.image_opacity,
            imagePath: parsed.image_path || parsed.source,
        }),
    ).descriptor;
    if (next.kind === 'image') splash.asset = next;
    return splash;
};

/** Configuration used when no file is available. */
export const defaultConfig = (): OverlayConfig => ({
    width: DEFAULT_SCREEN_WIDTH,
    height: DEFAULT_SCREEN_HEIGHT,
    osdX: 0,
    osdY: 0,
    showStats: true,
    idleMs: DEFAULT_IDLE_MS,
    udpStats: false,
    assets: [createDefaultDescriptor(0)],
    splash: createDefaultSplash(),
});

/**
 * Resolve a parsed JSON document.
 * @throws OverlayError `CONFIG_INVALID` when the document is not an object.
 */
export const parseConfig = (json: unknown, logger: Logger = console): OverlayConfig => {
    const result = ConfigSchema.safeParse(json);
    if (!result.success) {
        throw new OverlayError({
            message: 'Config must be a JSON object',
            domain: 'config',
            code: 'CONFIG_INVALID',
            details: {issues: result.error.issues.map((issue) => issue.message)},
        });
    }
    const raw = result.data;
    const defaults = defaultConfig();
    const idleMs = raw.idle_ms ?? raw.refresh_ms;
    return {
        width: raw.width ?? defaults.width,
        height: raw.height ?? defaults.height,
        osdX: raw.osd_x ?? defaults.osdX,
        osdY: raw.osd_y ?? defaults.osdY,
        showStats: raw.show_stats ?? defaults.showStats,
        idleMs: idleMs === undefined ? defaults.idleMs : clampInt(idleMs, MIN_IDLE_MS, MAX_IDLE_MS),
        udpStats: raw.udp_stats ?? defaults.udpStats,
        assets: buildAssets(raw, logger),
        splash: buildSplash(raw),
    };
};

/**
 * Read and parse a config file.
 * @throws OverlayError `CONFIG_UNREADABLE` or `CONFIG_INVALID`.
 */
export const readConfigFile = (path: string): unknown => {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (err) {
        throw new OverlayError({
            message: `Cannot read config ${path}`,
            domain: 'config',
            code: 'CONFIG_UNREADABLE',
            details: {path},
            cause: err,
        });
    }
    try {
        const json: unknown = JSON.parse(text);
        return json;
    } catch (err) {
        throw new OverlayError({
            message: `Config ${path} is not valid JSON`,
            domain: 'config',
            code: 'CONFIG_INVALID',
            details: {path},
            cause: err,
        });
    }
};

/**
 * Load a config file, falling back to defaults with a warning when it is
 * missing or unusable.
 */
export const loadConfig = (path: string = DEFAULT_CONFIG_PATH, logger: Logger = console): OverlayConfig => {
    try {
        return parseConfig(readConfigFile(path), logger);
    } catch (err) {
        if (!(err instanceof OverlayError)) throw err;
        logger.warn(`${err.message}, using defaults`);
        return defaultConfig();
    }
};
