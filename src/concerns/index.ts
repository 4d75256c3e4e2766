export * from './try-fn.js';
export * from './logger.js';
export * from './logger-redact.js';
export * from './http-client.js';
export * from './group-names.js';
