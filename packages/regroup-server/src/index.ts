// regroup-server/src/index.ts
// Public API — HTTP wrapper around libregroup.

export type { ServerConfig, LogLevel } from './config.js';
export type { SubscriptionFetcher } from './fetch.js';
export type { HandlerDeps, HandlerResponse } from './handler.js';

export { LOG_LEVELS, loadServerConfig } from './config.js';
export { FetchError, createSubscriptionFetcher } from './fetch.js';
export { YAML_HEADERS, firstValue, handleConvert } from './handler.js';
export { createApp } from './app.js';
