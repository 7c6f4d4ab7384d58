import { describe, expect, it } from 'vitest';

import { parseEnv } from '../../src/config/env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.EXIFTOOL_PATH).toBe('exiftool');
    expect(env.EXIFTOOL_TIMEOUT_MS).toBe(30000);
    expect(env.EXIFTOOL_MAX_RETRIES).toBe(3);
    expect(env.EXIFTOOL_RETRY_BASE_DELAY_MS).toBe(1000);
    expect(env.DISPLAY_UTC_OFFSET_MINUTES).toBe(480);
    expect(env.WRITE_GPS).toBe(true);
    expect(env.isDevelopment).toBe(true);
  });

  it('parses overrides', () => {
    const env = parseEnv({
      NODE_ENV: 'production',
      DISPLAY_UTC_OFFSET_MINUTES: '-300',
      WRITE_GPS: 'false'
    });

    expect(env.DISPLAY_UTC_OFFSET_MINUTES).toBe(-300);
    expect(env.WRITE_GPS).toBe(false);
    expect(env.isProduction).toBe(true);
  });

  it('names invalid fields', () => {
    expect(() => parseEnv({ EXIFTOOL_MAX_RETRIES: '50' })).toThrow(
      /Environment validation failed:\nEXIFTOOL_MAX_RETRIES/
    );
  });
});
