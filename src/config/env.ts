import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  LOG_DIR: z.string().min(1).default('.'),
  EXIFTOOL_PATH: z.string().min(1).default('exiftool'),
  EXIFTOOL_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1000)
        .max(600000)
        .describe('EXIFTOOL_TIMEOUT_MS must be within 1000-600000ms')
    ),
  EXIFTOOL_MAX_RETRIES: z
    .string()
    .default('3')
    .transform(value => Number(value))
    .pipe(z.number().int().min(0).max(10).describe('EXIFTOOL_MAX_RETRIES must be within 0-10')),
  EXIFTOOL_RETRY_BASE_DELAY_MS: z
    .string()
    .default('1000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(0)
        .max(60000)
        .describe('EXIFTOOL_RETRY_BASE_DELAY_MS must be within 0-60000ms')
    ),
  // UTC+8 unless overridden
  DISPLAY_UTC_OFFSET_MINUTES: z
    .string()
    .default('480')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(-720)
        .max(840)
        .describe('DISPLAY_UTC_OFFSET_MINUTES must be within -720..840')
    ),
  WRITE_GPS: z
    .string()
    .default('true')
    .transform(value => value === 'true')
});

export type ParsedEnvironment = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const formatted = parseResult.error.flatten();
    const errors = Object.entries(formatted.fieldErrors)
      .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  const data = parseResult.data;

  return {
    ...data,
    isDevelopment: data.NODE_ENV === 'development',
    isProduction: data.NODE_ENV === 'production',
    isTest: data.NODE_ENV === 'test'
  };
}

export const env = parseEnv(process.env);

export type AppEnvironment = typeof env;
