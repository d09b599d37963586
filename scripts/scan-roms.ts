#!/usr/bin/env tsx
import { existsSync, statSync } from 'node:fs';
import { scanRoms } from '@core/harness/inspect';
import { parseArgs } from './args';

(function main() {
  const dir = parseArgs(process.argv.slice(2)).dir ?? 'roms';
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    // eslint-disable-next-line no-console
    console.error(`Usage: scan-roms [--dir=path/to/roms]  (no directory at '${dir}')`);
    process.exit(2);
  }
  const { lines, totals } = scanRoms(dir);
  // eslint-disable-next-line no-console
  for (const line of lines) console.log(line);
  if (Object.keys(totals.byError).length) process.exitCode = 1;
})();
