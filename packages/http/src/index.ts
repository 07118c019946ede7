// Single-attempt JSON transport with timeout, hooks and instrumentation
export * from './client.js';

export * from './types.js';

export * from './instrumentation.js';

export * from './core/index.js';
