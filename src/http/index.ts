export * from './types.js';
export * from './result.js';
export * from './headers.js';
export * from './sink.js';
export * from './transport.js';
export * from './adapter.js';
export * from './retry.js';
export * from './segments.js';
export * from './segmented.js';
export * from './executor.js';
export * from './logging.js';
export * from './context.js';
export * from './client.js';
