import type { Segment } from '@core/cart/types';
import { envFlag } from '@core/env';
import { INesError } from './errors';
import type { RomRegion } from './errors';
import { HEADER_SIZE, TRAINER_SIZE, parseINesHeader } from './ines';
import type { INesHeader } from './ines';

export interface Cartridge {
  readonly header: INesHeader;
  readonly trainer: Uint8Array | null;
  readonly prg: Uint8Array;
  readonly chr: Uint8Array; // may be empty (CHR RAM)
  readonly rawHeader: Uint8Array;
}

export interface CartridgeLayout {
  trainer: Segment | null;
  prg: Segment;
  chr: Segment;
  end: number; // first byte after CHR ROM
}

/** Offsets of the trainer, PRG and CHR segments the header describes. */
export function cartridgeLayout(header: INesHeader): CartridgeLayout {
  let offset = HEADER_SIZE;
  let trainer: Segment | null = null;
  if (header.hasTrainer) {
    trainer = { offset, length: TRAINER_SIZE };
    offset += TRAINER_SIZE;
  }
  const prg = { offset, length: header.prgRomSize };
  offset += header.prgRomSize;
  const chr = { offset, length: header.chrRomSize };
  return { trainer, prg, chr, end: offset + header.chrRomSize };
}

function checkRom(buffer: Uint8Array, seg: Segment, region: RomRegion): void {
  const available = Math.max(0, buffer.length - seg.offset);
  if (available < seg.length) {
    throw new INesError('TruncatedRom', `${region} ROM truncated: header declares ${seg.length} bytes at offset ${seg.offset}, file has ${available}`, {
      region,
      expected: seg.length,
      actual: available,
    });
  }
}

/**
 * Slice a ROM image into an immutable cartridge using an already parsed header.
 * Every segment is validated before anything is copied, so a failure leaves
 * nothing behind. Bytes after CHR ROM are ignored.
 */
export function loadCartridge(buffer: Uint8Array, header: INesHeader): Cartridge {
  if (buffer.length < HEADER_SIZE) {
    throw new INesError('TooShort', `Header needs ${HEADER_SIZE} bytes, got ${buffer.length}`, { expected: HEADER_SIZE, actual: buffer.length });
  }
  const layout = cartridgeLayout(header);

  if (layout.trainer) {
    const available = Math.max(0, buffer.length - layout.trainer.offset);
    if (available < TRAINER_SIZE) {
      throw new INesError('TruncatedTrainer', `Header indicates a ${TRAINER_SIZE}-byte trainer but only ${available} bytes follow the header`, {
        expected: TRAINER_SIZE,
        actual: available,
      });
    }
  }
  checkRom(buffer, layout.prg, 'PRG');
  checkRom(buffer, layout.chr, 'CHR');

  if (envFlag('TRACE_CART')) {
    // eslint-disable-next-line no-console
    console.log(`[cart] mapper=${header.mapper} trainer=${layout.trainer ? layout.trainer.offset : '-'} prg=${layout.prg.offset}+${layout.prg.length} chr=${layout.chr.offset}+${layout.chr.length} trailing=${buffer.length - layout.end}`);
  }

  // subarray + copy: Buffer#slice would hand back a view of the caller's bytes
  const take = (seg: Segment): Uint8Array => new Uint8Array(buffer.subarray(seg.offset, seg.offset + seg.length));
  return Object.freeze({
    header,
    trainer: layout.trainer ? take(layout.trainer) : null,
    prg: take(layout.prg),
    chr: layout.chr.length ? take(layout.chr) : new Uint8Array(0),
    rawHeader: take({ offset: 0, length: HEADER_SIZE }),
  });
}

/** Header parse plus segment load over one buffer. */
export function parseINes(buffer: Uint8Array): Cartridge {
  return loadCartridge(buffer, parseINesHeader(buffer));
}
