import fs from 'fs';
import os from 'os';
import path from 'path';
import { RagError, type ErrorCode } from '@/lib/rag/errors';

export function makeTempDir(prefix: string = 'docqa-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function thrownCode(fn: () => unknown): ErrorCode | 'no error' | 'not a RagError' {
  try {
    fn();
  } catch (error) {
    return error instanceof RagError ? error.code : 'not a RagError';
  }
  return 'no error';
}

export async function rejectedCode(
  promise: Promise<unknown>
): Promise<ErrorCode | 'no error' | 'not a RagError'> {
  try {
    await promise;
  } catch (error) {
    return error instanceof RagError ? error.code : 'not a RagError';
  }
  return 'no error';
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
