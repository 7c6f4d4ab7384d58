/**
 * Metadata executor
 * Writes one file's timestamp through exiftool with timeout and lock-retry handling
 */

import type { Logger } from '../lib/logger.js';
import type {
  ExecutionOutcome,
  ExecutionStatus,
  GeoPoint,
  ResolvedTimestamp
} from '../types/index.js';

import { buildToolArguments } from './arguments.js';
import type { ToolResult, ToolRunner } from './runner.js';

export interface ExecutorConfig {
  timeoutMs: number;
  /** Extra attempts after a file-in-use failure */
  maxRetries: number;
  /** First backoff delay, doubled on every retry */
  retryBaseDelayMs: number;
  displayOffsetMinutes: number;
  dryRun?: boolean;
}

export interface WriteRequest {
  filePath: string;
  timestamp: ResolvedTimestamp;
  geo?: GeoPoint | null;
}

export type Sleep = (ms: number) => Promise<void>;

export interface AttemptResult {
  status: ExecutionStatus;
  reason?: string;
}

/** stderr phrases that mean another process holds the file */
export const LOCKED_FILE_SIGNATURES: readonly string[] = [
  'being used by another process',
  'resource busy or locked',
  'file is locked'
];

const MINOR_WARNING = /minor/i;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Drop exiftool's "[minor]" warnings and blank lines from its error stream
 */
export function filterMinorWarnings(stderr: string): string {
  return stderr
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0 && !MINOR_WARNING.test(line))
    .join('\n');
}

export function isLockedFileError(stderr: string): boolean {
  const lower = stderr.toLowerCase();
  return LOCKED_FILE_SIGNATURES.some(signature => lower.includes(signature));
}

export function classifyResult(result: ToolResult, timeoutMs: number): AttemptResult {
  if (result.timedOut) {
    return { status: 'timeout', reason: `exiftool timed out after ${timeoutMs}ms` };
  }

  if (result.exitCode === 0) {
    return { status: 'success' };
  }

  const diagnostics = filterMinorWarnings(result.stderr);

  if (isLockedFileError(result.stderr)) {
    return { status: 'transient_failure', reason: diagnostics || 'file is in use' };
  }

  const exit = result.exitCode === null ? 'was terminated' : `exited with code ${result.exitCode}`;
  return { status: 'permanent_failure', reason: diagnostics || `exiftool ${exit}` };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MetadataExecutor {
  private readonly runner: ToolRunner;
  private readonly config: ExecutorConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(runner: ToolRunner, config: ExecutorConfig, logger: Logger, sleep: Sleep = defaultSleep) {
    this.runner = runner;
    this.config = config;
    this.logger = logger;
    this.sleep = sleep;
  }

  async run(request: WriteRequest): Promise<ExecutionOutcome> {
    const file = request.filePath;
    const args = buildToolArguments({
      filePath: file,
      epochSeconds: request.timestamp.epochSeconds,
      offsetMinutes: this.config.displayOffsetMinutes,
      geo: request.geo
    });

    if (this.config.dryRun) {
      this.logger.info({ file, args }, 'Dry run, exiftool not invoked');
      return { status: 'success', attempts: 0 };
    }

    let first: AttemptResult;
    try {
      first = await this.attempt(args);
    } catch (error) {
      const reason = `failed to run exiftool: ${describeError(error)}`;
      this.logger.error({ file, reason }, 'exiftool could not be started');
      return { status: 'permanent_failure', attempts: 1, reason };
    }

    if (first.status === 'success') {
      this.logger.info({ file }, 'Metadata updated');
      return { status: 'success', attempts: 1 };
    }

    if (first.status !== 'transient_failure') {
      this.logger.error({ file, status: first.status, reason: first.reason }, 'Metadata write failed');
      return { status: first.status, attempts: 1, reason: first.reason };
    }

    return this.retry(file, args, first);
  }

  private async attempt(args: readonly string[]): Promise<AttemptResult> {
    const result = await this.runner.run(args, { timeoutMs: this.config.timeoutMs });
    return classifyResult(result, this.config.timeoutMs);
  }

  private async retry(file: string, args: readonly string[], first: AttemptResult): Promise<ExecutionOutcome> {
    const { maxRetries, retryBaseDelayMs } = this.config;
    let lastReason = first.reason;
    let lastStartFailed = false;

    for (let retry = 1; retry <= maxRetries; retry++) {
      // Exponential backoff: base * 2^(retry-1) (1s, 2s, 4s...)
      const backoffMs = retryBaseDelayMs * Math.pow(2, retry - 1);
      this.logger.warn(
        { file, retry, maxRetries, backoffMs, reason: lastReason },
        'File in use, backing off before retry'
      );
      await this.sleep(backoffMs);

      let outcome: AttemptResult;
      try {
        outcome = await this.attempt(args);
      } catch (error) {
        lastReason = describeError(error);
        lastStartFailed = true;
        this.logger.error({ file, retry, reason: lastReason }, 'exiftool could not be started on retry');
        continue;
      }

      if (outcome.status === 'success') {
        this.logger.info({ file, retry }, 'Metadata updated after retry');
        return { status: 'success', attempts: retry + 1 };
      }

      if (outcome.status !== 'transient_failure') {
        this.logger.error(
          { file, retry, status: outcome.status, reason: outcome.reason },
          'Metadata write failed during retry'
        );
        return { status: outcome.status, attempts: retry + 1, reason: outcome.reason };
      }

      lastReason = outcome.reason;
      lastStartFailed = false;
    }

    this.logger.error({ file, maxRetries }, 'Metadata write failed after all retries');

    if (lastStartFailed) {
      const reason = `exiftool could not be started on retry ${maxRetries}: ${lastReason ?? 'unknown error'}`;
      return { status: 'permanent_failure', attempts: maxRetries + 1, reason };
    }

    const reason = `file still in use after ${maxRetries} retries: ${lastReason ?? 'unknown error'}`;
    return { status: 'transient_failure', attempts: maxRetries + 1, reason };
  }
}
