/**
 * Bounded registry of tracked assets.
 * @module core/AssetRegistry
 */
import {MAX_ASSETS} from '../wire/constants';
import {createDefaultDescriptor, createRuntimeState} from './descriptor';
import type {AssetDescriptor, AssetRuntimeState} from './types';

/** One tracked asset: its descriptor and what was last pushed for it. */
export type AssetEntry = {
    descriptor: AssetDescriptor;
    runtime: AssetRuntimeState;
};

/** Ordered, fixed-capacity collection of assets keyed by id. */
export class AssetRegistry {
    private readonly entries: AssetEntry[] = [];

    /**
     * @param capacity Maximum number of tracked assets.
     */
    constructor(public readonly capacity: number = MAX_ASSETS) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Registry capacity must be a positive integer, got ${capacity}`);
        }
    }

    /** Number of tracked assets. */
    public get size(): number {
        return this.entries.length;
    }

    /** `true` when no further asset can be added. */
    public isFull(): boolean {
        return this.entries.length >= this.capacity;
    }

    /** Linear lookup by id. */
    public find(id: number): AssetEntry | undefined {
        return this.entries.find((entry) => entry.descriptor.id === id);
    }

    /**
     * Track a descriptor. Returns `undefined` when the id is already tracked
     * or the registry is full.
     */
    public add(descriptor: AssetDescriptor): AssetEntry | undefined {
        if (this.isFull() || this.find(descriptor.id)) return undefined;
        const entry: AssetEntry = {descriptor, runtime: createRuntimeState()};
        this.entries.push(entry);
        return entry;
    }

    /**
     * Find an asset or create a disabled placeholder for an unknown id.
     * @returns `undefined` when the id is unknown and the registry is full.
     */
    public ensure(id: number): AssetEntry | undefined {
        const existing = this.find(id);
        if (existing) return existing;
        if (this.isFull()) return undefined;
        return this.add({...createDefaultDescriptor(id), enabled: false});
    }

    /** Entries in insertion order. */
    public all(): AssetEntry[] {
        return [...this.entries];
    }

    /** Forget every entry. Visuals must have been destroyed by the caller. */
    public clear(): void {
        this.entries.length = 0;
    }

    public [Symbol.iterator](): Iterator<AssetEntry> {
        return this.entries[Symbol.iterator]();
    }
}
