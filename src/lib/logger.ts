import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, StreamEntry } from 'pino';

import { env } from '../config/index.js';

export type { Logger } from 'pino';

const APP_NAME = 'takeout-date-repair';

const prettyOptions = {
  colorize: true,
  translateTime: 'SYS:standard',
  singleLine: true,
  ignore: 'pid,hostname,app,env'
};

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: prettyOptions
    }
  : undefined;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: {
    app: APP_NAME,
    env: env.NODE_ENV
  },
  transport
});

export interface RunLoggerOptions {
  consoleLevel?: LevelWithSilent;
  /** Console sink, a pino-pretty transport unless given */
  consoleStream?: DestinationStream;
}

/**
 * Run-scoped logger: everything down to debug goes to `logFile`,
 * the console only gets `consoleLevel` and above.
 */
export function createRunLogger(logFile: string, options: RunLoggerOptions = {}): Logger {
  const consoleLevel = options.consoleLevel ?? env.LOG_LEVEL;
  const streams: StreamEntry[] = [
    { level: 'debug', stream: pino.destination({ dest: logFile, mkdir: true, sync: true }) }
  ];

  if (consoleLevel !== 'silent') {
    streams.push({
      level: consoleLevel,
      stream:
        options.consoleStream ??
        pino.transport({
          target: 'pino-pretty',
          options: prettyOptions
        })
    });
  }

  return pino(
    {
      level: 'debug',
      base: {
        app: APP_NAME,
        env: env.NODE_ENV
      }
    },
    pino.multistream(streams)
  );
}
