import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { type Logger, createLogger, errorMessageOf } from '@pdf-inspector/tools-core';
import { isPermissionError } from './errors.js';

/** Where a discovered PDF lives; always present, even when it cannot be stat-ed. */
export interface PdfLocation {
  filename: string;
  full_path: string;
  relative_path: string;
  directory: string;
}

export type WalkResult =
  | { kind: 'ok'; location: PdfLocation; size: number; modified: number }
  | { kind: 'permission-denied'; location: PdfLocation; message: string }
  | { kind: 'error'; location: PdfLocation; message: string };

export function isPdfName(name: string): boolean {
  return name.toLowerCase().endsWith('.pdf');
}

/** Stats a candidate; `undefined` when it resolves to something other than a regular file. */
async function describeFile(location: PdfLocation): Promise<WalkResult | undefined> {
  try {
    const stats = await stat(location.full_path);
    // A symbolic link named *.pdf may point at a directory.
    if (!stats.isFile()) return undefined;
    // Seconds since the epoch, with sub-second precision.
    return { kind: 'ok', location, size: stats.size, modified: stats.mtimeMs / 1000 };
  } catch (e: unknown) {
    const message = errorMessageOf(e);
    return isPermissionError(e)
      ? { kind: 'permission-denied', location, message }
      : { kind: 'error', location, message };
  }
}

/**
 * Walks `root` top-down and yields one result per `.pdf` file (any case).
 * Within a directory, its PDF files come first in `readdir` order, then each
 * subdirectory is walked in `readdir` order. That order depends on the
 * filesystem and is not sorted.
 *
 * Reading `root` itself must succeed or the generator throws. Subdirectories that
 * cannot be read are skipped. Symbolic links to directories are neither followed
 * nor listed, whatever their name.
 */
export async function* walkPdfFiles(
  root: string,
  logger: Logger = createLogger('walk'),
): AsyncGenerator<WalkResult> {
  const rootDirectory = path.resolve(root);
  const dirents = await readdir(rootDirectory, { withFileTypes: true });
  yield* walkDirectory(rootDirectory, rootDirectory, dirents, logger);
}

async function* walkDirectory(
  rootDirectory: string,
  directory: string,
  dirents: Dirent[],
  logger: Logger,
): AsyncGenerator<WalkResult> {
  const subdirectories: string[] = [];
  for (const dirent of dirents) {
    const fullPath = path.join(directory, dirent.name);
    if (dirent.isDirectory()) {
      subdirectories.push(fullPath);
      continue;
    }
    if (!isPdfName(dirent.name)) continue;
    const result = await describeFile({
      filename: dirent.name,
      full_path: fullPath,
      relative_path: path.relative(rootDirectory, fullPath),
      directory,
    });
    if (result) yield result;
  }

  for (const subdirectory of subdirectories) {
    let children: Dirent[];
    try {
      children = await readdir(subdirectory, { withFileTypes: true });
    } catch (e: unknown) {
      logger.warn(`Skipping unreadable directory ${subdirectory}: ${errorMessageOf(e)}`);
      continue;
    }
    yield* walkDirectory(rootDirectory, subdirectory, children, logger);
  }
}
