import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';
import { constants } from 'node:os';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
  /** True when the process was killed after `timeoutMs` */
  timedOut: boolean;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Kill the process with SIGKILL after this many milliseconds
   */
  timeoutMs?: number;
}

/**
 * Execute a command asynchronously and return the result.
 *
 * Every PDF tool (pdfinfo, pdftotext, pdfimages, magick, tesseract) is run
 * through this wrapper, which makes it the single seam tests mock.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/report.pdf']);
 * if (result.code === 0) console.log(result.stdout);
 *
 * const ocr = await spawnAsync('tesseract', ['page.png', 'stdout'], {
 *   timeoutMs: 60_000,
 * });
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    timeoutMs,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGKILL');
          }, timeoutMs)
        : undefined;

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code, signal) => {
      clearTimeout(timer);
      resolve({ stdout, stderr, code: exitCode(code, signal), timedOut });
    });

    proc.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
  });
}

/**
 * Shell-style exit status: a child ended by a signal reports 128 + signo.
 */
function exitCode(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) {
    return code;
  }
  return signal ? 128 + constants.signals[signal] : 1;
}
