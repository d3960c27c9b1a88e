export * from './config.js';
export * from './errors.js';
export * from './exposition.js';
export * from './http.js';
export * from './json-rpc.js';
export * from './logger.js';
export * from './metrics-sink.js';
export * from './poll-scheduler.js';
export * from './retry.js';
export * from './rippled.js';
export * from './sleep.js';
