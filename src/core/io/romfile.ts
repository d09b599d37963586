import { readFileSync, readdirSync, statSync } from 'node:fs';
import { extname, join } from 'node:path';
import { parseINes } from '@core/cart/cartridge';
import type { Cartridge } from '@core/cart/cartridge';

/**
 * Read a .nes file and decode it. I/O failures surface as the fs error,
 * decoding failures as INesError.
 */
export function loadRomFile(path: string): Cartridge {
  return parseINes(new Uint8Array(readFileSync(path)));
}

export type WalkErrorHandler = (path: string, error: unknown) => void;

/**
 * Recursive walk yielding .nes files. Without `onError` a failing readdir/stat
 * throws; with it the entry is reported and the walk continues.
 */
export function* findRomFiles(dir: string, onError?: WalkErrorHandler): Generator<string> {
  const guard = <T>(path: string, fn: () => T): T | undefined => {
    if (!onError) return fn();
    try {
      return fn();
    } catch (e) {
      onError(path, e);
      return undefined;
    }
  };
  const entries = guard(dir, () => readdirSync(dir).sort());
  if (!entries) return;
  for (const e of entries) {
    const p = join(dir, e);
    const st = guard(p, () => statSync(p));
    if (!st) continue;
    if (st.isDirectory()) yield* findRomFiles(p, onError);
    else if (st.isFile() && extname(p).toLowerCase() === '.nes') yield p;
  }
}
