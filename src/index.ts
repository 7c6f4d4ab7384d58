export * from './types/index.js';
export * from './sidecar/index.js';
export * from './exiftool/index.js';
export * from './pipeline/index.js';
export { parseEnv, executorConfigFromEnv } from './config/index.js';
export type { AppEnvironment } from './config/index.js';
export { createRunLogger } from './lib/logger.js';
export type { RunLoggerOptions } from './lib/logger.js';
