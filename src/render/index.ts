/**
 * Renderer contract and helpers.
 * @module render
 */
export * from './types';
export * from './geometry';
export * from './resolve';
export * from './RecordingRenderer';
