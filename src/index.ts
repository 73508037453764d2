/**
 * Telemetry overlay asset reconciliation.
 * @module overlay-telemetry
 */
export * from './core';
export * from './wire';
export * from './render';
export * from './runtime';
