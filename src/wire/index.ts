/**
 * Overlay datagram protocol.
 * @module wire
 */
export * from './constants';
export * from './scanner';
export * from './decoder';
export * from './packet';
export * from './receiver';
export * from './sender';
