import { stat } from 'node:fs/promises';
import path from 'node:path';
import { type Result, err, ok } from '@pdf-inspector/tools-core';
import {
  type ToolErrorInfo,
  isPermissionError,
  notADirectory,
  notAPdf,
  notAbsolutePath,
  notFound,
  permissionDenied,
} from './errors.js';

/**
 * What a path must point to:
 * - `pdf-file`: an existing path whose name ends in `.pdf` (any case)
 * - `file`: any existing path
 * - `directory`: an existing directory
 */
export type PathRequirement = 'pdf-file' | 'file' | 'directory';

/**
 * Checks a caller-supplied path before anything is opened. Checks run in a fixed
 * order and stop at the first failure: absolute, exists, `.pdf` suffix, directory.
 * Only `stat` is called; the path is returned as given, without canonicalisation.
 */
export async function validatePath(
  candidate: string,
  requirement: PathRequirement,
): Promise<Result<string, ToolErrorInfo>> {
  const kind = requirement === 'directory' ? 'directory' : 'file';

  if (!path.isAbsolute(candidate)) {
    return err(notAbsolutePath(candidate, kind));
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(candidate)).isDirectory();
  } catch (e: unknown) {
    return err(isPermissionError(e) ? permissionDenied(candidate, kind, e) : notFound(candidate, kind));
  }

  if (requirement === 'pdf-file' && !candidate.toLowerCase().endsWith('.pdf')) {
    return err(notAPdf(candidate));
  }
  if (requirement === 'directory' && !isDirectory) {
    return err(notADirectory(candidate));
  }
  return ok(candidate);
}
