/**
 * Asset reconciliation: turns deltas and channel changes into the minimal
 * list of renderer calls.
 * @module core/ReconciliationEngine
 */
import {resolveGeometry, resolveStyle} from '../render/resolve';
import type {RenderOp, Renderer} from '../render/types';
import type {AssetUpdate, DecodedDatagram} from '../wire/decoder';
import {AssetRegistry, type AssetEntry} from './AssetRegistry';
import {ChannelStore} from './ChannelStore';
import {anyFlag, createRuntimeState, noFlags} from './descriptor';
import type {Logger} from './logger';
import {diffDelta, mergeFlags} from './reconcile';
import {composeText} from './text';
import type {AssetDelta, AssetDescriptor, InvalidationFlags} from './types';
import {percentOf} from './utils';

export type ReconciliationEngineOptions = {
    /** Registry to reconcile. A new one with default capacity if omitted. */
    registry?: AssetRegistry;
    /** Channels to read. A new store if omitted. */
    channels?: ChannelStore;
    logger?: Logger;
};

/** Counters since construction. */
export type EngineCounters = {
    flushes: number;
    operations: number;
    droppedUpdates: number;
};

export class ReconciliationEngine {
    public readonly registry: AssetRegistry;
    public readonly channels: ChannelStore;
    private readonly logger: Logger;
    private readonly counters: EngineCounters = {flushes: 0, operations: 0, droppedUpdates: 0};

    constructor(
        private readonly renderer: Renderer,
        options: ReconciliationEngineOptions = {},
    ) {
        this.registry = options.registry ?? new AssetRegistry();
        this.channels = options.channels ?? new ChannelStore();
        this.logger = options.logger ?? console;
    }

    /**
     * Replace every tracked asset. Existing visuals are destroyed right away;
     * the new assets are created by the next flush.
     * @returns Descriptors that did not fit (duplicate id or over capacity).
     */
    public load(descriptors: readonly AssetDescriptor[]): AssetDescriptor[] {
        this.destroyAll();
        this.registry.clear();
        const rejected: AssetDescriptor[] = [];
        for (const descriptor of descriptors) {
            const entry = this.registry.add(descriptor);
            if (!entry) {
                rejected.push(descriptor);
                continue;
            }
            entry.runtime.pending.recreate = true;
        }
        return rejected;
    }

    /**
     * Merge a delta into an asset, creating a disabled placeholder for an
     * unknown id. Nothing is rendered until the next flush.
     * @returns Flags raised by this delta. An `enabled` flip to `true` is
     * reported as `recreate`. All flags are down when the update was dropped
     * because the registry is full.
     */
    public applyDelta(id: number, delta: AssetDelta): InvalidationFlags {
        const entry = this.registry.ensure(id);
        if (!entry) {
            this.counters.droppedUpdates++;
            this.logger.debug(`Asset registry full, dropping update for id ${id}`);
            return noFlags();
        }
        const {descriptor, flags, enabledChanged} = diffDelta(entry.descriptor, delta);
        entry.descriptor = descriptor;
        entry.runtime.pending = mergeFlags(entry.runtime.pending, flags);
        if (enabledChanged) {
            // A flip back within one window cancels out.
            entry.runtime.enabledChanged = !entry.runtime.enabledChanged;
        }
        return enabledChanged && descriptor.enabled ? {...flags, recreate: true} : flags;
    }

    /**
     * Apply a list of per-asset deltas. Updates for one id are merged in
     * order, last write wins, and diffed once.
     */
    public applyUpdates(updates: readonly AssetUpdate[]): void {
        const merged = new Map<number, AssetDelta>();
        for (const {id, ...delta} of updates) {
            merged.set(id, {...merged.get(id), ...delta});
        }
        for (const [id, delta] of merged) {
            this.applyDelta(id, delta);
        }
    }

    /**
     * Apply one decoded datagram: channel arrays first, then asset updates.
     * @returns `true` when a channel changed or an asset has pending work.
     */
    public applyDatagram(decoded: DecodedDatagram): boolean {
        let changed = false;
        if (decoded.values && this.channels.applyValues(decoded.values)) changed = true;
        if (decoded.texts && this.channels.applyTexts(decoded.texts)) changed = true;
        if (decoded.assetUpdates) this.applyUpdates(decoded.assetUpdates);
        return changed || this.hasPending();
    }

    /** `true` when any asset has flags waiting for a flush. */
    public hasPending(): boolean {
        return this.registry.all().some((entry) => anyFlag(entry.runtime.pending) || entry.runtime.enabledChanged);
    }

    /**
     * Compute the renderer calls the next flush would issue, in order.
     * Does not touch the renderer or any state.
     */
    public plan(): RenderOp[] {
        const ops: RenderOp[] = [];
        for (const entry of this.registry) {
            this.planEntry(entry, ops);
        }
        return ops;
    }

    /**
     * Issue the planned calls, then clear every pending flag.
     * @returns The operations that reached the renderer.
     */
    public flush(): RenderOp[] {
        const executed: RenderOp[] = [];
        for (const op of this.plan()) {
            const entry = this.registry.find(op.id);
            if (entry && this.execute(entry, op)) executed.push(op);
        }
        for (const entry of this.registry) {
            entry.runtime.pending = noFlags();
            entry.runtime.enabledChanged = false;
        }
        this.channels.consumeDirty();
        this.counters.flushes++;
        this.counters.operations += executed.length;
        return executed;
    }

    /** Mark every asset for recreation on the next flush. */
    public invalidateAll(): void {
        for (const entry of this.registry) {
            entry.runtime.pending.recreate = true;
        }
    }

    /**
     * Destroy every visual now and reset runtime state.
     * Descriptors stay tracked.
     */
    public destroyAll(): RenderOp[] {
        const ops: RenderOp[] = [];
        for (const entry of this.registry) {
            if (entry.runtime.handle === undefined) continue;
            const op: RenderOp = {type: 'destroy', id: entry.descriptor.id};
            this.execute(entry, op);
            ops.push(op);
        }
        return ops;
    }

    /** Number of assets that currently have a visual. */
    public liveCount(): number {
        return this.registry.all().filter((entry) => entry.runtime.handle !== undefined).length;
    }

    public stats(): EngineCounters {
        return {...this.counters};
    }

    private planEntry(entry: AssetEntry, ops: RenderOp[]): void {
        const {descriptor, runtime} = entry;
        const {id} = descriptor;
        const pending = runtime.pending;
        const hasPending = anyFlag(pending) || runtime.enabledChanged;
        const hasVisual = runtime.handle !== undefined;

        if (!descriptor.enabled) {
            if (hasVisual) ops.push({type: 'destroy', id});
            return;
        }
        if (!hasVisual && !hasPending) return;

        let lastPercent = runtime.lastPercent;
        let lastText = runtime.lastText;
        const percent = descriptor.kind === 'bar' ? this.percentFor(descriptor) : -1;

        if (!hasVisual || pending.recreate || runtime.enabledChanged) {
            if (hasVisual) ops.push({type: 'destroy', id});
            ops.push({type: 'create', id, kind: descriptor.kind});
            ops.push({type: 'restyle', id, style: resolveStyle(descriptor)});
            lastPercent = -1;
            lastText = '';
        } else {
            if (pending.relayout) {
                ops.push({type: 'relayout', id, geometry: resolveGeometry(descriptor, percent)});
            }
            if (pending.restyle) {
                ops.push({type: 'restyle', id, style: resolveStyle(descriptor)});
            }
        }

        if (descriptor.kind === 'bar' && percent !== lastPercent) {
            ops.push({type: 'setPercent', id, percent});
        }
        const text = composeText(descriptor.text, this.channels);
        if (text !== lastText) {
            ops.push({type: 'setText', id, text});
        }
    }

    private percentFor(descriptor: AssetDescriptor): number {
        if (descriptor.kind !== 'bar') return -1;
        return percentOf(this.channels.getValue(descriptor.valueIndex), descriptor.range.min, descriptor.range.max);
    }

    /** Run one op against the renderer. Returns `false` when it was skipped. */
    private execute(entry: AssetEntry, op: RenderOp): boolean {
        const runtime = entry.runtime;
        if (op.type === 'create') {
            const handle = this.renderer.create(entry.descriptor);
            entry.runtime = {...createRuntimeState(), pending: runtime.pending, handle};
            if (handle === undefined) {
                this.logger.warn(`Renderer could not create asset ${entry.descriptor.id} (${entry.descriptor.kind})`);
                return false;
            }
            return true;
        }
        const handle = runtime.handle;
        if (handle === undefined) return false;
        switch (op.type) {
            case 'destroy':
                this.renderer.destroy(handle);
                entry.runtime = {...createRuntimeState(), pending: runtime.pending};
                return true;
            case 'relayout':
                this.renderer.relayout(handle, op.geometry);
                return true;
            case 'restyle':
                this.renderer.restyle(handle, op.style);
                return true;
            case 'setPercent':
                this.renderer.setPercent(handle, op.percent);
                runtime.lastPercent = op.percent;
                return true;
            case 'setText':
                this.renderer.setText(handle, op.text);
                runtime.lastText = op.text;
                return true;
        }
    }
}
