import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { type Logger, type Part, isJsonPart } from '@pdf-inspector/tools-core';
import { type Mock, vi } from 'vitest';
import { type FakePdf, encodeFakePdf } from './fakeMupdf.js';

export interface TempDir {
  root: string;
  /** Writes `content` to `relativePath` below the root, creating parents; returns the absolute path. */
  write(relativePath: string, content: string): Promise<string>;
  writePdf(relativePath: string, pdf: FakePdf): Promise<string>;
  mkdir(relativePath: string): Promise<string>;
  remove(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const root = await mkdtemp(path.join(tmpdir(), 'pdf-inspector-'));
  const write = async (relativePath: string, content: string) => {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
    return target;
  };
  return {
    root,
    write,
    writePdf: (relativePath, pdf) => write(relativePath, encodeFakePdf(pdf)),
    mkdir: async (relativePath) => {
      const target = path.join(root, relativePath);
      await mkdir(target, { recursive: true });
      return target;
    },
    remove: () => rm(root, { recursive: true, force: true }),
  };
}

/** An error shaped like the ones `node:fs` throws. */
export function fsError(code: string, syscall: string, target: string): Error {
  const description = code === 'ENOENT' ? 'no such file or directory' : 'permission denied';
  return Object.assign(new Error(`${code}: ${description}, ${syscall} '${target}'`), { code, syscall });
}

export type TestLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function createTestLogger(): TestLogger {
  return {
    error: vi.fn<Logger['error']>(),
    warn: vi.fn<Logger['warn']>(),
    info: vi.fn<Logger['info']>(),
    debug: vi.fn<Logger['debug']>(),
  };
}

/** The value of the single JSON part a tool answers with. */
export function jsonValueOf(parts: Part[]): unknown {
  const [part, ...rest] = parts;
  if (!part || rest.length > 0 || !isJsonPart(part)) {
    throw new Error(`Expected exactly one JSON part, got ${JSON.stringify(parts)}`);
  }
  return part.value;
}
