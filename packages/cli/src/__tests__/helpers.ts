import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';

export interface CapturedOutput {
  stdout: () => string;
  stderr: () => string;
  restore: () => void;
}

/**
 * Capture process.stdout/stderr writes and console.error calls.
 */
export function captureOutput(): CapturedOutput {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];

  const stdoutSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stdoutChunks.push(String(chunk));
      return true;
    });
  const stderrSpy = vi
    .spyOn(process.stderr, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      stderrChunks.push(String(chunk));
      return true;
    });
  const consoleErrorSpy = vi
    .spyOn(console, 'error')
    .mockImplementation((...args: unknown[]) => {
      stderrChunks.push(`${args.map(String).join(' ')}\n`);
    });

  return {
    stdout: () => stdoutChunks.join(''),
    stderr: () => stderrChunks.join(''),
    restore: () => {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      consoleErrorSpy.mockRestore();
    },
  };
}

/**
 * Make process.exit throw `EXIT:<code>` so the exit path can be asserted.
 */
export function mockExit(): { restore: () => void } {
  const exitSpy = vi
    .spyOn(process, 'exit')
    .mockImplementation((code?: string | number | null) => {
      throw new Error(`EXIT:${code ?? 0}`);
    });
  return { restore: () => exitSpy.mockRestore() };
}

export interface TempDir {
  dir: string;
  file: (name: string, contents: string) => Promise<string>;
  cleanup: () => Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'schemasmith-cli-'));
  return {
    dir,
    file: async (name, contents) => {
      const filePath = path.join(dir, name);
      await writeFile(filePath, contents, 'utf8');
      return filePath;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
