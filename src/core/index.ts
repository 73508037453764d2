/**
 * Core model: channels, assets, reconciliation.
 * @module core
 */
export * from './types';
export * from './utils';
export * from './errors';
export * from './logger';
export * from './descriptor';
export * from './ChannelStore';
export * from './AssetRegistry';
export * from './reconcile';
export * from './text';
export * from './ReconciliationEngine';
