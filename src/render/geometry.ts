/**
 * Segmented bar geometry.
 * @module render/geometry
 */

/** One segment of a segmented bar track. */
export type Segment = {
    /** Offset from the track start (px). */
    offset: number;
    /** Slot width including the trailing gap (px). */
    width: number;
    /** Width actually painted (px); the last segment has no gap. */
    drawWidth: number;
};

/** Layout of a segmented bar for one track width, segment count and percent. */
export type SegmentLayout = {
    /** Effective segment count. */
    count: number;
    /** `floor(trackWidth / count)`. */
    baseWidth: number;
    /** Pixels left over, given one each to the first segments. */
    remainder: number;
    /** Gap painted between segments. */
    gap: number;
    /** Number of segments painted as filled. */
    filled: number;
    segments: Segment[];
};

/** Gap between segments for a base segment width. */
export const segmentGap = (baseWidth: number): number => {
    if (baseWidth >= 14) return 3;
    if (baseWidth >= 8) return 2;
    if (baseWidth >= 5) return 1;
    return 0;
};

/**
 * Split a track into segments and count the filled ones.
 * A track narrower than the segment count collapses into one segment.
 * @param trackWidth Track width in pixels.
 * @param segmentCount Requested number of segments.
 * @param percent Fill level 0-100.
 */
export const segmentLayout = (trackWidth: number, segmentCount: number, percent: number): SegmentLayout => {
    const width = Math.max(0, Math.trunc(trackWidth));
    let count = Math.max(1, Math.trunc(segmentCount));
    let baseWidth = Math.floor(width / count);
    if (baseWidth <= 0) {
        count = 1;
        baseWidth = width;
    }
    const remainder = width - baseWidth * count;
    const gap = segmentGap(baseWidth);
    const pct = Math.min(100, Math.max(0, Math.trunc(percent)));
    const filled = pct === 0 ? 0 : Math.min(count, Math.ceil((pct * count) / 100));

    const segments: Segment[] = [];
    let offset = 0;
    for (let i = 0; i < count; i++) {
        const slot = baseWidth + (i < remainder ? 1 : 0);
        const drawWidth = i < count - 1 && gap < slot ? slot - gap : slot;
        segments.push({offset, width: slot, drawWidth});
        offset += slot;
    }
    return {count, baseWidth, remainder, gap, filled, segments};
};
