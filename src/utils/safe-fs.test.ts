import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import {
  PathValidationError,
  validatePath,
  safeExistsSync,
  safeReadFileSync,
  safeWriteFileSync,
  safeRenameSync,
  safeUnlinkSync,
  safeMkdirSync,
  safeReaddirSync,
  getErrorCode,
} from './safe-fs.js';

describe('safe-fs', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'safe-fs-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('resolves relative paths to absolute ones', () => {
      expect(validatePath('a/../b')).toBe(resolve('b'));
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
    });

    it('rejects paths with null bytes', () => {
      expect(() => validatePath('bad\0path')).toThrow('Path cannot contain null bytes');
    });
  });

  it('writes, reads, renames and deletes files', () => {
    const source = join(dir, 'a.txt');
    const target = join(dir, 'b.txt');

    safeWriteFileSync(source, 'hello');
    expect(safeReadFileSync(source)).toBe('hello');

    safeRenameSync(source, target);
    expect(safeExistsSync(source)).toBe(false);
    expect(safeReadFileSync(target)).toBe('hello');

    safeUnlinkSync(target);
    expect(safeExistsSync(target)).toBe(false);
  });

  it('creates nested directories and lists entries sorted', () => {
    const nested = join(dir, 'x', 'y');
    safeMkdirSync(nested, { recursive: true });
    safeWriteFileSync(join(nested, 'b.json'), '{}');
    safeWriteFileSync(join(nested, 'a.json'), '{}');

    expect(safeReaddirSync(nested)).toEqual(['a.json', 'b.json']);
  });

  it('exposes the system error code of a failed read', () => {
    let caught: unknown;
    try {
      safeReadFileSync(join(dir, 'missing.txt'));
    } catch (error) {
      caught = error;
    }
    expect(getErrorCode(caught)).toBe('ENOENT');
    expect(getErrorCode(new Error('plain'))).toBeUndefined();
  });
});
