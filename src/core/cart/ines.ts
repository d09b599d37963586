import type { Byte } from '@core/cart/types';
import { INesError } from './errors';

export type RomFormat = 'ines' | 'nes2';
export type Mirroring = 'horizontal' | 'vertical' | 'four-screen';
export type ConsoleType = 'standard' | 'vs-system' | 'playchoice-10' | 'extended';
export type Region = 'ntsc' | 'pal' | 'multi' | 'unknown';

export interface INesHeader {
  readonly format: RomFormat;
  readonly mapper: number;
  readonly submapper: number; // always 0 for iNES 1.0
  readonly prgRomSize: number;
  readonly chrRomSize: number; // 0 => board uses CHR RAM
  readonly prgRamSize: number;
  readonly prgNvramSize: number; // battery-backed PRG RAM
  readonly chrRamSize: number;
  readonly chrNvramSize: number;
  readonly mirroring: Mirroring;
  readonly hasBattery: boolean;
  readonly hasTrainer: boolean;
  readonly console: ConsoleType;
  readonly region: Region;
}

export const HEADER_SIZE = 16;
export const TRAINER_SIZE = 512;
export const PRG_UNIT = 16 * 1024;
export const CHR_UNIT = 8 * 1024;
export const INES_PRG_RAM_UNIT = 8 * 1024;
export const INES_DEFAULT_CHR_RAM = 8 * 1024;

const MAGIC = [0x4E, 0x45, 0x53, 0x1A] as const; // "NES" + MS-DOS EOF

// iNES 1.0 leaves byte 8 at zero on most dumps. These boards carry WRAM at
// $6000 regardless, so they get 8KB when the header is silent.
export const INES_DEFAULT_PRG_RAM_MAPPERS: ReadonlySet<number> = new Set([1, 4]);

const CONSOLE_TYPES: readonly ConsoleType[] = ['standard', 'vs-system', 'playchoice-10', 'extended'];
const NES2_REGIONS: readonly Region[] = ['ntsc', 'pal', 'multi', 'unknown'];

// flags7 bits 2..3 == 0b10 marks NES 2.0; every other value is read as iNES 1.0.
export function detectFormat(flags7: Byte): RomFormat {
  return ((flags7 >>> 2) & 0x03) === 0b10 ? 'nes2' : 'ines';
}

/** NES 2.0 RAM/NVRAM shift count: 0 means absent, otherwise 64 << n bytes. */
export function decodeRamShift(n: number): number {
  const v = n & 0x0F;
  return v === 0 ? 0 : 64 << v;
}

function hasMagic(buffer: Uint8Array): boolean {
  return MAGIC.every((b, i) => buffer[i] === b);
}

/**
 * Decode the 16-byte header at the start of an iNES / NES 2.0 image.
 * Bytes past the header are not looked at.
 *
 * The NES 2.0 exponent-multiplier ROM size form (size MSB nibble 0xF) is not
 * decoded; byte 9 nibbles are always plain bank-count extensions.
 *
 * @throws INesError `TooShort` or `BadMagic`
 */
export function parseINesHeader(buffer: Uint8Array): INesHeader {
  if (buffer.length < HEADER_SIZE) {
    throw new INesError('TooShort', `Header needs ${HEADER_SIZE} bytes, got ${buffer.length}`, { expected: HEADER_SIZE, actual: buffer.length });
  }
  if (!hasMagic(buffer)) throw new INesError('BadMagic', "Missing iNES magic (expected 'NES\\x1A')");

  const flags6 = buffer[6] & 0xFF;
  const flags7 = buffer[7] & 0xFF;
  const b8 = buffer[8] & 0xFF;
  const b9 = buffer[9] & 0xFF;
  const format = detectFormat(flags7);

  let mapper = ((flags6 >>> 4) & 0x0F) | (flags7 & 0xF0);
  let submapper = 0;
  let prgBanks = buffer[4] & 0xFF;
  let chrBanks = buffer[5] & 0xFF;
  let prgRamSize: number;
  let prgNvramSize = 0;
  let chrRamSize: number;
  let chrNvramSize = 0;
  let region: Region;

  if (format === 'nes2') {
    mapper |= (b8 & 0x0F) << 8; // mapper bits 8..11
    submapper = (b8 >>> 4) & 0x0F;

    prgBanks |= (b9 & 0x0F) << 8;
    chrBanks |= ((b9 >>> 4) & 0x0F) << 8;

    const b10 = buffer[10] & 0xFF;
    const b11 = buffer[11] & 0xFF;
    prgRamSize = decodeRamShift(b10);
    prgNvramSize = decodeRamShift(b10 >>> 4);
    chrRamSize = decodeRamShift(b11);
    chrNvramSize = decodeRamShift(b11 >>> 4);

    region = NES2_REGIONS[buffer[12] & 0x03];
  } else {
    if (b8 !== 0) prgRamSize = b8 * INES_PRG_RAM_UNIT;
    else prgRamSize = INES_DEFAULT_PRG_RAM_MAPPERS.has(mapper) ? INES_PRG_RAM_UNIT : 0;
    chrRamSize = chrBanks === 0 ? INES_DEFAULT_CHR_RAM : 0;
    region = (b9 & 0x01) ? 'pal' : 'ntsc';
  }

  const mirroring: Mirroring = (flags6 & 0x08) ? 'four-screen' : (flags6 & 0x01) ? 'vertical' : 'horizontal';

  return Object.freeze({
    format,
    mapper,
    submapper,
    prgRomSize: prgBanks * PRG_UNIT,
    chrRomSize: chrBanks * CHR_UNIT,
    prgRamSize,
    prgNvramSize,
    chrRamSize,
    chrNvramSize,
    mirroring,
    hasBattery: (flags6 & 0x02) !== 0,
    hasTrainer: (flags6 & 0x04) !== 0,
    console: CONSOLE_TYPES[flags7 & 0x03],
    region,
  });
}
