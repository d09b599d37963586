#!/usr/bin/env tsx
import { inspectRom } from '@core/harness/inspect';
import { parseArgs } from './args';

(function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.rom) {
    // eslint-disable-next-line no-console
    console.error('Usage: cart-info --rom=path/to/game.nes [--json]');
    process.exit(2);
  }
  const { exitCode, lines } = inspectRom(args.rom, { json: args.json === 'true' });
  for (const line of lines) {
    // eslint-disable-next-line no-console
    (exitCode ? console.error : console.log)(line);
  }
  process.exit(exitCode);
})();
