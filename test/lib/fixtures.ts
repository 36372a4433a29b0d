import { execFileSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import type { Backend, BackendFactory } from '../../src/index.ts';
import { TMP_DIR } from './constants.ts';

export function makeTempDir(name: string): string {
  fs.mkdirSync(TMP_DIR, { recursive: true });
  return fs.mkdtempSync(path.join(TMP_DIR, `${name}-`));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Create a named pipe and open its read end without waiting for a writer
 */
export function openFifo(dir: string, name: string): number {
  const file = path.join(dir, name);
  execFileSync('mkfifo', [file]);
  return fs.openSync(file, fs.constants.O_RDONLY | fs.constants.O_NONBLOCK);
}

/**
 * Backend whose operations answer with its own id, for resolution tests
 */
export function fakeBackend(id: string): Backend {
  return {
    id,
    diff: async () => Buffer.from(`diff:${id}`),
    patch: async () => Buffer.from(`patch:${id}`),
  };
}

export interface CountingFactory {
  factory: BackendFactory;
  calls(): number;
}

export function counting(id: string, delayMs = 0): CountingFactory {
  let calls = 0;
  return {
    factory: async () => {
      calls++;
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
      return fakeBackend(id);
    },
    calls: () => calls,
  };
}

export function failing(message: string): CountingFactory {
  let calls = 0;
  return {
    factory: () => {
      calls++;
      throw new Error(message);
    },
    calls: () => calls,
  };
}
