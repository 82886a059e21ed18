/**
 * @tokenpulse/connectors
 * Signal source adapters and classifiers for TokenPulse
 */

export * from './types.js';
export * from './dexscreener/index.js';
export * from './explorer/index.js';

// Classifiers
export * from './classifiers/keyword.js';
export * from './classifiers/openai.js';

export * from './posts/memory.js';
