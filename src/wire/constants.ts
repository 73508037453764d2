/**
 * Overlay wire protocol and channel layout constants.
 * @module wire/constants
 */

/** Default UDP port the overlay listens on. */
export const OVERLAY_PORT = 7777;

/** Largest datagram the protocol allows (bytes). */
export const MAX_PAYLOAD = 1280;

/** Receive buffer size; anything beyond is treated as truncated. */
export const MAX_RECEIVE = 2048;

/** Number of externally fed channels (written by datagrams). */
export const EXTERNAL_CHANNELS = 16;

/** Number of locally computed channels (written by telemetry sources). */
export const LOCAL_CHANNELS = 8;

/** Total channel count; locally computed channels follow the external ones. */
export const CHANNEL_COUNT = EXTERNAL_CHANNELS + LOCAL_CHANNELS;

/** First index of the locally computed channel range. */
export const LOCAL_CHANNEL_BASE = EXTERNAL_CHANNELS;

/** Max characters stored per text channel. */
export const MAX_TEXT_LENGTH = 96;

/** Max characters of an asset label. */
export const MAX_LABEL_LENGTH = 63;

/** Max characters of an image path. */
export const MAX_IMAGE_PATH_LENGTH = 255;

/** Max characters of a composed widget text. */
export const MAX_COMPOSED_TEXT_LENGTH = 127;

/** Max entries of an asset's `text_indices` list. */
export const MAX_TEXT_INDICES = 8;

/** Registry capacity. */
export const MAX_ASSETS = 8;

/** Largest accepted asset id. */
export const MAX_ASSET_ID = 63;

/** Largest segment count of a segmented bar. */
export const MAX_SEGMENTS = 64;
