// Main exports for the shared trading logic
export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './indicators/indicators.js';
export * from './trading/strategies.js';
export * from './trading/keyedLock.js';
export * from './trading/scheduler.js';
export * from './trading/executor.js';
export * from './trading/engine.js';
export * from './database/operations.js';
export * from './database/memory.js';
