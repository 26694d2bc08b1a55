export { createApp } from './app.js';
export type { AppDeps } from './app.js';
export { loadConfig, API_PREFIX } from './config.js';
export type { ServerConfig } from './config.js';
export { startServer } from './server.js';
export type { RunningServer } from './server.js';
export { toWireTask, toWireStatistics } from './serializers.js';
export type { WireTask, WireStatistics } from './serializers.js';
export { toErrorResponse } from './middleware/error-handler.js';
export type { ErrorBody } from './middleware/error-handler.js';
