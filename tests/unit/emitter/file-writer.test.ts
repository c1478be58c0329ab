import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { resolveUnitPath, writeUnits } from '../../../src/lib/emitter/file-writer.js';
import { FileIOError } from '../../../src/utils/errors.js';

describe('File writer', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'bindsmith-writer-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  describe('resolveUnitPath()', () => {
    it('should resolve paths below the output directory', () => {
      expect(resolveUnitPath(outDir, 'geometry/Point.ts')).toBe(resolve(outDir, 'geometry', 'Point.ts'));
    });

    it('should refuse paths that climb out', () => {
      expect(() => resolveUnitPath(outDir, '../escape.ts')).toThrow(FileIOError);
      expect(() => resolveUnitPath(outDir, 'geometry/../../escape.ts')).toThrow(
        /Refusing to write outside the output directory/,
      );
    });

    it('should refuse absolute paths and the directory itself', () => {
      expect(() => resolveUnitPath(outDir, resolve(outDir, '..', 'elsewhere.ts'))).toThrow(FileIOError);
      expect(() => resolveUnitPath(outDir, '.')).toThrow(FileIOError);
    });
  });

  describe('writeUnits()', () => {
    it('should create directories and write every unit', async () => {
      const result = await writeUnits(
        [
          { path: 'geometry/Point.ts', code: 'export class Point {}\n' },
          { path: 'index.ts', code: 'export * as geometry from "./geometry/index.js";\n' },
        ],
        outDir,
      );

      expect(result.written).toBe(2);
      expect(result.destination).toBe(resolve(outDir));
      expect(result.paths).toEqual([resolve(outDir, 'geometry/Point.ts'), resolve(outDir, 'index.ts')]);
      expect(await readFile(join(outDir, 'geometry', 'Point.ts'), 'utf-8')).toBe('export class Point {}\n');
    });

    it('should overwrite files from an earlier run', async () => {
      await writeFile(join(outDir, 'index.ts'), 'stale\n');
      await writeUnits([{ path: 'index.ts', code: 'fresh\n' }], outDir);
      expect(await readFile(join(outDir, 'index.ts'), 'utf-8')).toBe('fresh\n');
    });

    it('should wrap write failures', async () => {
      await writeFile(join(outDir, 'geometry'), 'a file where a directory belongs\n');
      await expect(writeUnits([{ path: 'geometry/Point.ts', code: '' }], outDir)).rejects.toThrow(
        'Failed to write geometry/Point.ts',
      );
    });
  });
});
