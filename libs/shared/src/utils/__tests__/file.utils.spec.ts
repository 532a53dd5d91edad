import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { atomicWriteJson, readJsonFile } from '../file.utils';

describe('file.utils', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'file-utils-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('should write pretty-printed JSON', () => {
      const target = join(dir, 'record.json');

      atomicWriteJson(target, { a: 1 });

      expect(readFileSync(target, 'utf8')).toBe('{\n  "a": 1\n}');
    });

    it('should create missing parent directories', () => {
      const target = join(dir, 'nested', 'deeper', 'record.json');

      atomicWriteJson(target, { ok: true });

      expect(readJsonFile(target)).toEqual({ ok: true });
    });

    it('should replace the previous content entirely', () => {
      const target = join(dir, 'record.json');

      atomicWriteJson(target, { first: 'x', shared: 1 });
      atomicWriteJson(target, { shared: 2 });

      expect(readJsonFile(target)).toEqual({ shared: 2 });
    });

    it('should not leave temp files behind', () => {
      atomicWriteJson(join(dir, 'record.json'), { a: 1 });

      expect(readdirSync(dir)).toEqual(['record.json']);
    });
  });

  describe('readJsonFile', () => {
    it('should return null when file does not exist', () => {
      expect(readJsonFile(join(dir, 'missing.json'))).toBeNull();
    });

    it('should return null for invalid JSON', () => {
      const target = join(dir, 'broken.json');
      writeFileSync(target, 'not json', 'utf8');

      expect(readJsonFile(target)).toBeNull();
    });

    it('should return null when path is a directory', () => {
      expect(readJsonFile(dir)).toBeNull();
    });
  });
});
