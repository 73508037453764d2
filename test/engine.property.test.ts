/**
 * Replay properties of the reconciliation engine.
 *
 * Applying a datagram and flushing brings the visuals in sync; applying the
 * very same datagram again must then change nothing and issue no renderer
 * call, whatever the datagram carried.
 */
import * as fc from 'fast-check';
import {describe, expect, it} from 'vitest';

import {
    buildDatagram,
    createDefaultDescriptor,
    decodeDatagram,
    ReconciliationEngine,
    RecordingRenderer,
    silentLogger,
    type AssetKind,
    type AssetUpdate,
    type DatagramOptions,
    type Orientation,
    type ValueEntry,
} from '../src';

const valueEntry: fc.Arbitrary<ValueEntry> = fc.oneof(
    fc.double({noNaN: true, noDefaultInfinity: true, min: -1e6, max: 1e6}),
    fc.constant(null),
    fc.constant<''>(''),
);

const textEntry = fc.oneof(fc.string({maxLength: 8}), fc.constant(null));

const assetUpdate: fc.Arbitrary<AssetUpdate> = fc.record(
    {
        id: fc.integer({min: 0, max: 3}),
        enabled: fc.boolean(),
        kind: fc.constantFrom<AssetKind>('bar', 'text', 'image'),
        valueIndex: fc.integer({min: -2, max: 30}),
        textIndex: fc.integer({min: -3, max: 30}),
        textIndices: fc.array(fc.integer({min: 0, max: 23}), {maxLength: 3}),
        textInline: fc.boolean(),
        label: fc.string({maxLength: 8}),
        x: fc.integer({min: -100, max: 2000}),
        width: fc.integer({min: -1, max: 640}),
        min: fc.integer({min: -100, max: 100}),
        max: fc.integer({min: -100, max: 100}),
        barColor: fc.integer({min: 0, max: 0xffffff}),
        background: fc.integer({min: -3, max: 14}),
        backgroundOpacity: fc.integer({min: -10, max: 120}),
        imageOpacity: fc.integer({min: 0, max: 100}),
        segments: fc.integer({min: 0, max: 80}),
        roundedOutline: fc.boolean(),
        orientation: fc.constantFrom<Orientation>('left', 'right'),
        imagePath: fc.constantFrom('', '/tmp/a.png', '/tmp/b.png'),
    },
    {requiredKeys: ['id']},
);

const datagramOptions: fc.Arbitrary<DatagramOptions> = fc.record(
    {
        values: fc.array(valueEntry, {maxLength: 8}),
        texts: fc.array(textEntry, {maxLength: 4}),
        assetUpdates: fc.array(assetUpdate, {maxLength: 2}),
    },
    {requiredKeys: []},
);

describe('ReconciliationEngine replay', () => {
    it('replaying an applied datagram is a no-op', () => {
        fc.assert(fc.property(datagramOptions, (options) => {
            const renderer = new RecordingRenderer();
            const engine = new ReconciliationEngine(renderer, {logger: silentLogger});
            engine.load([createDefaultDescriptor(0)]);
            engine.flush();

            const payload = buildDatagram(options);
            engine.applyDatagram(decodeDatagram(payload));
            engine.flush();
            renderer.reset();

            expect(engine.applyDatagram(decodeDatagram(payload))).toBe(false);
            expect(engine.flush()).toEqual([]);
            expect(renderer.calls).toEqual([]);
        }));
    });

    it('every live handle belongs to an enabled asset after a flush', () => {
        fc.assert(fc.property(fc.array(datagramOptions, {maxLength: 5}), (sequence) => {
            const renderer = new RecordingRenderer();
            const engine = new ReconciliationEngine(renderer, {logger: silentLogger});
            engine.load([createDefaultDescriptor(0)]);
            engine.flush();

            for (const options of sequence) {
                engine.applyDatagram(decodeDatagram(buildDatagram(options)));
                engine.flush();
            }

            const live = [...renderer.liveHandles().values()].sort((a, b) => a - b);
            const enabled = engine.registry
                .all()
                .filter((entry) => entry.descriptor.enabled)
                .map((entry) => entry.descriptor.id)
                .sort((a, b) => a - b);
            expect(live).toEqual(enabled);
        }));
    });
});
