/**
 * Headless renderer that records every call.
 * @module render/RecordingRenderer
 */
import type {AssetDescriptor, AssetKind, RenderHandle} from '../core/types';
import type {AssetGeometry, AssetStyle, Renderer} from './types';

/** One recorded renderer call. Handles are sequential numbers from 1. */
export type RenderCall =
    | {method: 'create'; handle: number; id: number; kind: AssetKind}
    | {method: 'destroy'; handle: number}
    | {method: 'setPercent'; handle: number; percent: number}
    | {method: 'setText'; handle: number; text: string}
    | {method: 'relayout'; handle: number; geometry: AssetGeometry}
    | {method: 'restyle'; handle: number; style: AssetStyle};

export type RecordingRendererOptions = {
    /** Called after each recorded call. */
    onCall?: (call: RenderCall) => void;
    /** Return `false` to make `create` fail for a descriptor. */
    canCreate?: (descriptor: Readonly<AssetDescriptor>) => boolean;
};

/** Renderer without a display. Useful headless and in tests. */
export class RecordingRenderer implements Renderer {
    public readonly calls: RenderCall[] = [];
    private readonly live = new Map<number, number>();
    private nextHandle = 1;

    constructor(private readonly options: RecordingRendererOptions = {}) {}

    public create(descriptor: Readonly<AssetDescriptor>): RenderHandle | undefined {
        if (this.options.canCreate && !this.options.canCreate(descriptor)) return undefined;
        const handle = this.nextHandle++;
        this.live.set(handle, descriptor.id);
        this.record({method: 'create', handle, id: descriptor.id, kind: descriptor.kind});
        return handle;
    }

    public destroy(handle: RenderHandle): void {
        const h = this.checked(handle);
        this.live.delete(h);
        this.record({method: 'destroy', handle: h});
    }

    public setPercent(handle: RenderHandle, percent: number): void {
        this.record({method: 'setPercent', handle: this.checked(handle), percent});
    }

    public setText(handle: RenderHandle, text: string): void {
        this.record({method: 'setText', handle: this.checked(handle), text});
    }

    public relayout(handle: RenderHandle, geometry: AssetGeometry): void {
        this.record({method: 'relayout', handle: this.checked(handle), geometry});
    }

    public restyle(handle: RenderHandle, style: AssetStyle): void {
        this.record({method: 'restyle', handle: this.checked(handle), style});
    }

    /** Handles created and not yet destroyed, mapped to their asset id. */
    public liveHandles(): Map<number, number> {
        return new Map(this.live);
    }

    /** Forget recorded calls (live handles are kept). */
    public reset(): void {
        this.calls.length = 0;
    }

    private checked(handle: RenderHandle): number {
        if (typeof handle !== 'number' || !this.live.has(handle)) {
            throw new Error(`Unknown render handle ${String(handle)}`);
        }
        return handle;
    }

    private record(call: RenderCall): void {
        this.calls.push(call);
        this.options.onCall?.(call);
    }
}
