import { isINesError } from '@core/cart/errors';
import type { INesErrorKind } from '@core/cart/errors';
import { mapperName } from '@core/cart/mapper_names';
import { cartridgeInfo, formatLabel, summarizeCartridge } from '@core/cart/summary';
import type { RomFormat } from '@core/cart/ines';
import { findRomFiles, loadRomFile } from '@core/io/romfile';

export interface InspectResult {
  exitCode: 0 | 1;
  lines: string[];
}

const describeError = (e: unknown): string => {
  if (isINesError(e)) return `${e.kind}${e.region ? `(${e.region})` : ''}: ${e.message}`;
  return e instanceof Error ? e.message : String(e);
};

/** Summary (or JSON) for a single ROM file. Decode and I/O errors become `[ERR]` lines. */
export function inspectRom(path: string, opts: { json?: boolean } = {}): InspectResult {
  try {
    const cart = loadRomFile(path);
    if (opts.json) return { exitCode: 0, lines: [JSON.stringify(cartridgeInfo(cart), null, 2)] };
    return { exitCode: 0, lines: [`ROM: ${path}`, ...summarizeCartridge(cart)] };
  } catch (e) {
    return { exitCode: 1, lines: [`[ERR] ${describeError(e)}`] };
  }
}

export interface ScanTotals {
  total: number;
  ok: number;
  byFormat: Record<RomFormat, number>;
  byError: Partial<Record<INesErrorKind | 'IO', number>>;
}

export interface ScanResult {
  lines: string[];
  totals: ScanTotals;
}

export function scanRoms(dir: string): ScanResult {
  const totals: ScanTotals = { total: 0, ok: 0, byFormat: { ines: 0, nes2: 0 }, byError: {} };
  const lines: string[] = [];
  const fail = (file: string, e: unknown): void => {
    const kind = isINesError(e) ? e.kind : 'IO';
    totals.byError[kind] = (totals.byError[kind] ?? 0) + 1;
    lines.push(`[ERR] ${file}: ${describeError(e)}`);
  };
  const walkError = (file: string, e: unknown): void => {
    totals.total++;
    fail(file, e);
  };
  for (const file of findRomFiles(dir, walkError)) {
    totals.total++;
    try {
      const { header } = loadRomFile(file);
      totals.ok++;
      totals.byFormat[header.format]++;
      const sub = header.format === 'nes2' ? `.${header.submapper}` : '';
      lines.push(`[OK] ${file}  mapper=${header.mapper}${sub} ${mapperName(header.mapper)} ${formatLabel[header.format]}`);
    } catch (e) {
      fail(file, e);
    }
  }
  lines.push('');
  lines.push(`Scanned ${totals.total} ROMs; ${totals.ok} decoded (iNES 1.0: ${totals.byFormat.ines}, NES 2.0: ${totals.byFormat.nes2})`);
  for (const [kind, n] of Object.entries(totals.byError)) lines.push(`  ${kind}: ${n}`);
  return { lines, totals };
}
