/**
 * Record/replay harness for the Projects client.
 * @module simulation
 */

export * from './codec.js';
export * from './config.js';
export * from './errors.js';
export * from './facade.js';
export * from './mode.js';
export * from './operations.js';
export * from './recorder.js';
export * from './recording-client.js';
export * from './replayer.js';
export * from './replaying-client.js';
export * from './storage.js';
export * from './types.js';
