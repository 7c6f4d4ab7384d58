#!/usr/bin/env node

/**
 * Takeout date repair CLI
 *
 * Restores capture dates on exported photos and videos from their JSON
 * sidecars.
 *
 * Usage:
 *   takeout-date-repair -d "/path/to/Takeout/Google Photos" [--dry-run] [--no-gps]
 *
 * Exit codes:
 *   0   - every sidecar processed successfully
 *   101 - run completed with recorded failures
 *   1   - invalid directory or fatal error
 */

import { DateTime } from 'luxon';
import { realpathSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { env, executorConfigFromEnv } from './config/index.js';
import { MetadataExecutor } from './exiftool/executor.js';
import { ExifToolProcessRunner } from './exiftool/runner.js';
import type { ToolRunner } from './exiftool/runner.js';
import { createRunLogger, logger } from './lib/logger.js';
import { createRunContext, runBatch } from './pipeline/batch.js';
import { writeFailureReport } from './pipeline/report.js';

export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  completedWithFailures: 101
} as const;

export interface CliOptions {
  directory: string;
  dryRun: boolean;
  gps: boolean;
  logDir: string;
}

export interface MainDependencies {
  createRunner?: (command: string) => ToolRunner;
}

export async function parseArguments(argv: string[]): Promise<CliOptions> {
  const parsed = await yargs(hideBin(argv))
    .scriptName('takeout-date-repair')
    .usage('$0 -d <directory>')
    .option('directory', {
      alias: 'd',
      type: 'string',
      demandOption: true,
      describe: 'Root directory of the exported archive'
    })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Log the exiftool arguments without writing anything'
    })
    .option('gps', {
      type: 'boolean',
      default: env.WRITE_GPS,
      describe: 'Also write GPS coordinates from geoData'
    })
    .option('log-dir', {
      type: 'string',
      default: env.LOG_DIR,
      describe: 'Directory for the run log and failure report'
    })
    .strict()
    .help()
    .parseAsync();

  return {
    directory: parsed.directory,
    dryRun: parsed['dry-run'],
    gps: parsed.gps,
    logDir: parsed['log-dir']
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function main(
  argv: string[] = process.argv,
  { createRunner = command => new ExifToolProcessRunner(command) }: MainDependencies = {}
): Promise<number> {
  const options = await parseArguments(argv);
  const logFile = join(
    resolve(options.logDir),
    `PhotoRepair_${DateTime.now().toFormat('yyyyMMdd_HHmmss')}.log`
  );
  const runLogger = createRunLogger(logFile);
  const targetDir = resolve(options.directory);

  if (!(await isDirectory(targetDir))) {
    runLogger.error({ directory: targetDir }, 'Invalid directory');
    return EXIT_CODES.fatal;
  }

  try {
    const executor = new MetadataExecutor(
      createRunner(env.EXIFTOOL_PATH),
      executorConfigFromEnv(options.dryRun),
      runLogger
    );
    const { summary, failures } = await runBatch(
      targetDir,
      { executor, writeGps: options.gps },
      createRunContext(runLogger)
    );

    if (failures.length === 0) {
      runLogger.info(summary, 'All files repaired');
      return EXIT_CODES.ok;
    }

    const reportPath = await writeFailureReport(failures, logFile);
    runLogger.warn({ ...summary, reportPath }, 'Run completed with failures');
    return EXIT_CODES.completedWithFailures;
  } catch (error) {
    runLogger.error({ err: error }, 'Unhandled error during run');
    return EXIT_CODES.fatal;
  }
}

/**
 * True when `scriptPath` resolves to this module. The npm bin shim runs it
 * through a symlink, so both sides are compared as real filesystem paths.
 */
export function isEntryPoint(scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error(error, 'Fatal error');
      process.exitCode = EXIT_CODES.fatal;
    });
}
