import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createRunLogger, logger } from '../../src/lib/logger.js';

function collectingStream() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString('utf-8'));
      callback();
    }
  });
  return { stream, lines };
}

describe('Logger', () => {
  it('should create logger instance', () => {
    expect(logger).toBeDefined();
  });

  it('should honour LOG_LEVEL from the environment', () => {
    expect(logger.level).toBe('silent');
  });

  it('should have standard logging methods', () => {
    expect(logger.info).toBeInstanceOf(Function);
    expect(logger.error).toBeInstanceOf(Function);
    expect(logger.warn).toBeInstanceOf(Function);
    expect(logger.debug).toBeInstanceOf(Function);
  });
});

describe('createRunLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tdr-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes debug lines to the run log while the console keeps its own level', async () => {
    const logFile = join(dir, 'logs', 'PhotoRepair_test.log');
    const consoleSink = collectingStream();

    const runLogger = createRunLogger(logFile, { consoleLevel: 'info', consoleStream: consoleSink.stream });
    runLogger.debug('resolving sidecar');
    runLogger.info('metadata updated');

    const fileLines = (await readFile(logFile, 'utf-8')).trim().split('\n');
    expect(fileLines).toHaveLength(2);
    expect(fileLines[0]).toContain('"level":20');
    expect(fileLines[0]).toContain('"msg":"resolving sidecar"');
    expect(fileLines[1]).toContain('"level":30');
    expect(fileLines[1]).toContain('"msg":"metadata updated"');

    expect(consoleSink.lines).toHaveLength(1);
    expect(consoleSink.lines[0]).toContain('"msg":"metadata updated"');
  });

  it('still writes the run log when the console is silent', async () => {
    const logFile = join(dir, 'PhotoRepair_silent.log');

    const runLogger = createRunLogger(logFile, { consoleLevel: 'silent' });
    runLogger.debug({ field: 'photoTakenTime.timestamp' }, 'Resolved timestamp');

    const content = await readFile(logFile, 'utf-8');
    expect(content).toContain('"field":"photoTakenTime.timestamp"');
    expect(content).toContain('"msg":"Resolved timestamp"');
  });

  it('takes the console level from LOG_LEVEL by default', async () => {
    const logFile = join(dir, 'PhotoRepair_default.log');
    const consoleSink = collectingStream();

    const runLogger = createRunLogger(logFile, { consoleStream: consoleSink.stream });
    runLogger.error('exiftool could not be started');

    expect(consoleSink.lines).toEqual([]);
    expect(await readFile(logFile, 'utf-8')).toContain('"msg":"exiftool could not be started"');
  });
});
