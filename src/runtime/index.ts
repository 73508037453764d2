/**
 * Overlay runtime loop and its collaborators.
 * @module runtime
 */
export * from './config';
export * from './PushScheduler';
export * from './Splash';
export * from './signals';
export * from './stats';
export * from './telemetry';
export * from './HotReloadController';
export * from './OverlayRuntime';
