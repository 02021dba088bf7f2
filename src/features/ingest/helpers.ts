/**
 * Helper functions for opening input files
 */

import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';

import { FileOpenError } from '../../types/errors';

const OPEN_ERROR_REASONS: Record<string, string> = {
  ENOENT: 'does not exist',
  ENOTDIR: 'does not exist',
  EACCES: 'is not readable',
  EPERM: 'is not readable',
  EISDIR: 'is a directory',
};

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Describe why a file could not be opened
 * @param err - Error raised by the file system
 * @returns Reason phrase completing `File "<path>" ...`
 */
export function describeOpenError(err: unknown): string {
  const code = errorCode(err);
  if (code !== undefined && code in OPEN_ERROR_REASONS) {
    return OPEN_ERROR_REASONS[code];
  }

  const detail = err instanceof Error ? err.message : String(err);
  return `could not be opened (${detail})`;
}

/**
 * Open a regular file for reading
 *
 * @param path - File path
 * @returns Open file handle; the caller owns it
 * @throws {FileOpenError} When the path is missing, unreadable or a directory
 */
export async function openSource(path: string): Promise<FileHandle> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new FileOpenError(path, describeOpenError(err));
  }

  try {
    const info = await handle.stat();
    if (info.isDirectory()) {
      throw new FileOpenError(path, OPEN_ERROR_REASONS.EISDIR);
    }
  } catch (err) {
    await handle.close();
    throw err instanceof FileOpenError ? err : new FileOpenError(path, describeOpenError(err));
  }

  return handle;
}
