import type { ChildProcess } from 'node:child_process';

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { spawnAsync } from './spawn-utils';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

interface MockProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill: ReturnType<typeof vi.fn>;
}

function createMockProcess(options?: { hasStdout?: boolean }): MockProcess {
  const proc = new EventEmitter() as MockProcess;
  proc.stdout =
    options?.hasStdout === false ? null : new Readable({ read() {} });
  proc.stderr = new Readable({ read() {} });
  proc.kill = vi.fn();
  return proc;
}

function useProcess(proc: MockProcess): void {
  spawnMock.mockReturnValue(proc as unknown as ChildProcess);
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('captures stdout and stderr', async () => {
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('pdfinfo', ['/tmp/a.pdf']);

    proc.stdout?.emit('data', Buffer.from('Pages: 3'));
    proc.stderr?.emit('data', Buffer.from('warning'));
    proc.emit('close', 0);

    await expect(promise).resolves.toEqual({
      stdout: 'Pages: 3',
      stderr: 'warning',
      code: 0,
      timedOut: false,
    });
    expect(spawnMock).toHaveBeenCalledWith('pdfinfo', ['/tmp/a.pdf'], {});
  });

  test('does not pass wrapper options to spawn', async () => {
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('tesseract', ['x.png', 'stdout'], {
      cwd: '/work',
      captureStderr: false,
      timeoutMs: 1000,
    });
    proc.emit('close', 0);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('tesseract', ['x.png', 'stdout'], {
      cwd: '/work',
    });
  });

  test('skips stdout capture when the stream is missing', async () => {
    const proc = createMockProcess({ hasStdout: false });
    useProcess(proc);

    const promise = spawnAsync('magick', []);
    proc.emit('close', 1);

    const result = await promise;
    expect(result.stdout).toBe('');
    expect(result.code).toBe(1);
  });

  test('reports a process ended by a signal as a failure', async () => {
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('tesseract', ['page.png', 'stdout']);
    proc.emit('close', null, 'SIGKILL');

    const result = await promise;
    expect(result.code).toBe(137);
    expect(result.timedOut).toBe(false);
  });

  test('maps the terminating signal to 128 + its number', async () => {
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('pdftotext', []);
    proc.emit('close', null, 'SIGTERM');

    expect((await promise).code).toBe(143);
  });

  test('kills the process after timeoutMs', async () => {
    vi.useFakeTimers();
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('tesseract', [], { timeoutMs: 500 });
    vi.advanceTimersByTime(500);
    proc.emit('close', null, 'SIGKILL');

    const result = await promise;
    expect(proc.kill).toHaveBeenCalledWith('SIGKILL');
    expect(result.timedOut).toBe(true);
    expect(result.code).toBe(137);
  });

  test('rejects when the process fails to start', async () => {
    const proc = createMockProcess();
    useProcess(proc);

    const promise = spawnAsync('missing-tool', []);
    proc.emit('error', new Error('spawn missing-tool ENOENT'));

    await expect(promise).rejects.toThrow('spawn missing-tool ENOENT');
  });
});
