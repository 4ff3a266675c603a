import type { StatOptions } from 'node:fs';
import { stat, symlink } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type TempDir, createTempDir, createTestLogger, fsError } from './testing/fixtures.js';
import { type WalkResult, isPdfName, walkPdfFiles } from './walk.js';

// Paths mapped to the error `stat` or `readdir` should throw for them.
const fsFailures = vi.hoisted(() => new Map<string, Error>());

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  const failureFor = (target: string) => fsFailures.get(target);
  return {
    ...actual,
    stat: async (target: string, options?: StatOptions) => {
      const failure = failureFor(target);
      if (failure) throw failure;
      return actual.stat(target, options);
    },
    readdir: async (target: string, options: { withFileTypes: true }) => {
      const failure = failureFor(target);
      if (failure) throw failure;
      return actual.readdir(target, options);
    },
  };
});

async function collect(root: string, logger = createTestLogger()): Promise<WalkResult[]> {
  const results: WalkResult[] = [];
  for await (const result of walkPdfFiles(root, logger)) {
    results.push(result);
  }
  return results;
}

const relativePaths = (results: WalkResult[]) => results.map((result) => result.location.relative_path);

describe('isPdfName', () => {
  it('matches the .pdf suffix in any case', () => {
    expect(isPdfName('a.pdf')).toBe(true);
    expect(isPdfName('B.PDF')).toBe(true);
    expect(isPdfName('c.Pdf')).toBe(true);
    expect(isPdfName('d.pdf.txt')).toBe(false);
    expect(isPdfName('pdf')).toBe(false);
  });
});

describe('walkPdfFiles', () => {
  let dir: TempDir;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    fsFailures.clear();
    await dir.remove();
  });

  it('finds PDFs at every depth and nothing else', async () => {
    await dir.write('a.pdf', 'a');
    await dir.write('b.PDF', 'b');
    await dir.write('c.txt', 'c');
    await dir.write('sub/d.pdf', 'd');
    await dir.write('sub/deeper/e.pdf', 'e');
    await dir.write('folder.pdf/f.pdf', 'f');

    const results = await collect(dir.root);

    expect(relativePaths(results).sort()).toEqual([
      'a.pdf',
      'b.PDF',
      path.join('folder.pdf', 'f.pdf'),
      path.join('sub', 'd.pdf'),
      path.join('sub', 'deeper', 'e.pdf'),
    ]);
  });

  it('yields the files of a directory before descending', async () => {
    await dir.write('sub/nested.pdf', 'x');
    await dir.write('top-1.pdf', 'x');
    await dir.write('top-2.pdf', 'x');

    const results = await collect(dir.root);

    expect(relativePaths(results.slice(0, 2)).sort()).toEqual(['top-1.pdf', 'top-2.pdf']);
    expect(results[2]?.location.relative_path).toBe(path.join('sub', 'nested.pdf'));
  });

  it('describes where each file lives, with its size and modification time', async () => {
    const fullPath = await dir.write('sub/report.pdf', 'hello');
    const stats = await stat(fullPath);

    expect(await collect(dir.root)).toEqual([
      {
        kind: 'ok',
        location: {
          filename: 'report.pdf',
          full_path: fullPath,
          relative_path: path.join('sub', 'report.pdf'),
          directory: path.join(dir.root, 'sub'),
        },
        size: 5,
        modified: stats.mtimeMs / 1000,
      },
    ]);
  });

  it('keeps files it may not stat, with the reason', async () => {
    const locked = await dir.write('locked.pdf', 'x');
    const looping = await dir.write('looping.pdf', 'x');
    fsFailures.set(locked, fsError('EACCES', 'stat', locked));
    fsFailures.set(looping, Object.assign(new Error('ELOOP: too many symbolic links'), { code: 'ELOOP' }));

    const results = await collect(dir.root);
    const byName = new Map(results.map((result) => [result.location.filename, result]));

    expect(byName.get('locked.pdf')).toMatchObject({
      kind: 'permission-denied',
      message: `EACCES: permission denied, stat '${locked}'`,
    });
    expect(byName.get('looping.pdf')).toMatchObject({
      kind: 'error',
      message: 'ELOOP: too many symbolic links',
    });
  });

  it('skips subdirectories it cannot read and warns', async () => {
    await dir.write('top.pdf', 'x');
    const hidden = await dir.mkdir('hidden');
    await dir.write('hidden/secret.pdf', 'x');
    const logger = createTestLogger();
    fsFailures.set(hidden, fsError('EACCES', 'scandir', hidden));

    const results = await collect(dir.root, logger);

    expect(relativePaths(results)).toEqual(['top.pdf']);
    expect(logger.warn).toHaveBeenCalledWith(
      `Skipping unreadable directory ${hidden}: EACCES: permission denied, scandir '${hidden}'`,
    );
  });

  it('throws when the root itself cannot be read', async () => {
    fsFailures.set(dir.root, fsError('EACCES', 'scandir', dir.root));

    await expect(collect(dir.root)).rejects.toThrow('EACCES: permission denied');
  });

  it('does not follow symbolic links to directories', async () => {
    await dir.write('elsewhere/linked.pdf', 'x');
    await symlink(path.join(dir.root, 'elsewhere'), path.join(dir.root, 'shortcut'));

    expect(relativePaths(await collect(dir.root))).toEqual([path.join('elsewhere', 'linked.pdf')]);
  });

  it('neither lists nor follows a directory link named like a PDF', async () => {
    await dir.write('archive/inside.pdf', 'x');
    await dir.write('plain.pdf', 'x');
    await symlink(path.join(dir.root, 'archive'), path.join(dir.root, 'bundle.pdf'));

    expect(relativePaths(await collect(dir.root)).sort()).toEqual([
      path.join('archive', 'inside.pdf'),
      'plain.pdf',
    ]);
  });

  it('lists a file link named like a PDF', async () => {
    const target = await dir.write('original.pdf', 'abc');
    await symlink(target, path.join(dir.root, 'alias.pdf'));

    const results = await collect(dir.root);
    const alias = results.find((result) => result.location.filename === 'alias.pdf');

    expect(alias).toMatchObject({ kind: 'ok', size: 3 });
    expect(results).toHaveLength(2);
  });

  it('reports paths relative to the resolved root', async () => {
    await dir.write('sub/a.pdf', 'x');

    const results = await collect(`${dir.root}/sub/..`);

    expect(results[0]?.location).toMatchObject({
      relative_path: path.join('sub', 'a.pdf'),
      full_path: path.join(dir.root, 'sub', 'a.pdf'),
    });
  });
});
