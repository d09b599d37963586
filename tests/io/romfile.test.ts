import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findRomFiles, loadRomFile } from '@core/io/romfile';
import { makeRom, thrown } from '@test/helpers/ines';

let dir = '';

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'nes-romfile-'));
  mkdirSync(join(dir, 'sub'));
  writeFileSync(join(dir, 'b.nes'), makeRom({ mapper: 1 }));
  writeFileSync(join(dir, 'a.nes'), makeRom());
  writeFileSync(join(dir, 'notes.txt'), 'not a rom');
  writeFileSync(join(dir, 'sub', 'C.NES'), makeRom({ format: 'nes2' }));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadRomFile', () => {
  it('reads and decodes a file', () => {
    const cart = loadRomFile(join(dir, 'b.nes'));
    expect(cart.header.mapper).toBe(1);
    expect(cart.prg.length).toBe(16384);
    expect(cart.chr.length).toBe(8192);
  });

  it('passes file-system errors through', () => {
    expect(thrown(() => loadRomFile(join(dir, 'missing.nes')))).toMatchObject({ code: 'ENOENT' });
  });
});

describe('findRomFiles', () => {
  it('walks subdirectories in name order and matches .nes case-insensitively', () => {
    expect([...findRomFiles(dir)]).toEqual([
      join(dir, 'a.nes'),
      join(dir, 'b.nes'),
      join(dir, 'sub', 'C.NES'),
    ]);
  });
});

describe('findRomFiles with a dangling symlink', () => {
  let broken = '';

  beforeAll(() => {
    broken = mkdtempSync(join(tmpdir(), 'nes-romfile-broken-'));
    writeFileSync(join(broken, 'a.nes'), makeRom());
    symlinkSync(join(broken, 'nowhere.nes'), join(broken, 'b.nes'));
    writeFileSync(join(broken, 'c.nes'), makeRom());
  });

  afterAll(() => {
    rmSync(broken, { recursive: true, force: true });
  });

  it('throws without an error handler', () => {
    expect(thrown(() => [...findRomFiles(broken)])).toMatchObject({ code: 'ENOENT' });
  });

  it('reports the entry and keeps walking with a handler', () => {
    const failed: string[] = [];
    const found = [...findRomFiles(broken, (path, e) => failed.push(`${path} ${e instanceof Error && 'code' in e ? String(e.code) : ''}`))];
    expect(found).toEqual([join(broken, 'a.nes'), join(broken, 'c.nes')]);
    expect(failed).toEqual([`${join(broken, 'b.nes')} ENOENT`]);
  });

  it('reports an unreadable root directory', () => {
    const failed: string[] = [];
    expect([...findRomFiles(join(broken, 'missing'), (path) => failed.push(path))]).toEqual([]);
    expect(failed).toEqual([join(broken, 'missing')]);
  });
});
