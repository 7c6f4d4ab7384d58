import { execFile } from 'node:child_process';

export interface ToolResult {
  /** null when the process was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ToolRunOptions {
  timeoutMs: number;
}

/**
 * Seam between the executor and the operating system
 */
export interface ToolRunner {
  run(args: readonly string[], options: ToolRunOptions): Promise<ToolResult>;
}

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/**
 * Runs exiftool as a child process, one invocation per call.
 *
 * Non-zero exits and timeouts resolve with a result; failing to start the
 * process at all (missing binary, output overflow) rejects.
 */
export class ExifToolProcessRunner implements ToolRunner {
  constructor(private readonly command: string = 'exiftool') {}

  run(args: readonly string[], { timeoutMs }: ToolRunOptions): Promise<ToolResult> {
    return new Promise((resolve, reject) => {
      execFile(
        this.command,
        [...args],
        {
          encoding: 'utf8',
          timeout: timeoutMs,
          windowsHide: true,
          maxBuffer: MAX_OUTPUT_BYTES
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }

          if (typeof error.code === 'string') {
            reject(error);
            return;
          }

          if (error.killed) {
            resolve({ exitCode: null, stdout, stderr, timedOut: true });
            return;
          }

          if (typeof error.code === 'number') {
            resolve({ exitCode: error.code, stdout, stderr, timedOut: false });
            return;
          }

          // terminated by a signal we did not send
          resolve({ exitCode: null, stdout, stderr, timedOut: false });
        }
      );
    });
  }
}
