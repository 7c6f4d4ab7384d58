/**
 * Batch driver
 *
 * Walks a directory tree and, one sidecar at a time, matches it to its media
 * file, resolves the capture time and hands the write to the executor. Every
 * per-file problem becomes a FailureRecord in the run ledger; nothing thrown
 * while handling a single sidecar stops the walk.
 */

import type { MetadataExecutor } from '../exiftool/executor.js';
import type { Logger } from '../lib/logger.js';
import { resolveGeo } from '../sidecar/geo.js';
import { matchMediaFile, listFiles } from '../sidecar/matcher.js';
import type { DirectoryLister } from '../sidecar/matcher.js';
import { readSidecar } from '../sidecar/reader.js';
import { resolveTimestamp } from '../sidecar/timestamp.js';
import type { FailureRecord, ResolvedTimestamp, RunSummary } from '../types/index.js';

import { RunLedger } from './ledger.js';
import { findSidecars } from './walk.js';

export interface RunContext {
  logger: Logger;
  ledger: RunLedger;
}

export interface BatchDependencies {
  executor: MetadataExecutor;
  writeGps?: boolean;
  listDirectory?: DirectoryLister;
}

export type FileOutcome =
  | { ok: true; mediaPath: string; timestamp: ResolvedTimestamp }
  | { ok: false; failure: FailureRecord };

export interface BatchResult {
  summary: RunSummary;
  failures: readonly FailureRecord[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Carry one sidecar through match → parse → resolve → execute
 */
export async function processSidecar(
  sidecarPath: string,
  deps: BatchDependencies,
  logger: Logger
): Promise<FileOutcome> {
  const match = await matchMediaFile(sidecarPath, deps.listDirectory ?? listFiles);
  if (!match.matched) {
    return { ok: false, failure: { path: sidecarPath, stage: 'match', reason: match.reason } };
  }

  const mediaPath = match.mediaPath;
  logger.debug({ sidecar: sidecarPath, media: mediaPath, strategy: match.strategy }, 'Matched media file');

  let record: unknown;
  try {
    record = await readSidecar(sidecarPath);
  } catch (error) {
    return {
      ok: false,
      failure: { path: sidecarPath, stage: 'parse', reason: `invalid sidecar JSON: ${describeError(error)}` }
    };
  }

  const timestamp = resolveTimestamp(record, logger.child({ sidecar: sidecarPath }));
  if (!timestamp) {
    return { ok: false, failure: { path: mediaPath, stage: 'resolve', reason: 'no valid timestamp' } };
  }

  const geo = deps.writeGps === false ? null : resolveGeo(record, logger);

  const outcome = await deps.executor.run({ filePath: mediaPath, timestamp, geo });
  if (outcome.status !== 'success') {
    return {
      ok: false,
      failure: {
        path: mediaPath,
        stage: 'execute',
        reason: outcome.reason ?? outcome.status
      }
    };
  }

  return { ok: true, mediaPath, timestamp };
}

/**
 * Process every sidecar under `rootDir` sequentially, folding results into
 * the context's ledger.
 */
export async function runBatch(
  rootDir: string,
  deps: BatchDependencies,
  context: RunContext
): Promise<BatchResult> {
  const { logger, ledger } = context;
  const sidecars = await findSidecars(rootDir);
  logger.info({ rootDir, sidecars: sidecars.length }, 'Starting metadata repair');

  for (const sidecarPath of sidecars) {
    let outcome: FileOutcome;
    try {
      outcome = await processSidecar(sidecarPath, deps, logger);
    } catch (error) {
      outcome = {
        ok: false,
        failure: { path: sidecarPath, stage: 'processing', reason: `processing error: ${describeError(error)}` }
      };
    }

    if (outcome.ok) {
      ledger.recordSuccess();
    } else {
      logger.warn(outcome.failure, 'File not repaired');
      ledger.recordFailure(outcome.failure);
    }
  }

  const summary = ledger.summary();
  logger.info(summary, 'Metadata repair finished');

  return { summary, failures: ledger.failures };
}

export function createRunContext(logger: Logger): RunContext {
  return { logger, ledger: new RunLedger() };
}
