import type { ExecutorConfig } from '../exiftool/executor.js';

import { env } from './env.js';

export { env, parseEnv } from './env.js';
export type { AppEnvironment, ParsedEnvironment } from './env.js';

// Executor settings derived from the environment
export const executorConfigFromEnv = (dryRun = false): ExecutorConfig => ({
  timeoutMs: env.EXIFTOOL_TIMEOUT_MS,
  maxRetries: env.EXIFTOOL_MAX_RETRIES,
  retryBaseDelayMs: env.EXIFTOOL_RETRY_BASE_DELAY_MS,
  displayOffsetMinutes: env.DISPLAY_UTC_OFFSET_MINUTES,
  dryRun
});
