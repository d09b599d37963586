import { crc32, crc32Concat } from '@utils/crc32';
import { formatSize, hex32 } from '@utils/format';
import type { Cartridge } from './cartridge';
import type { ConsoleType, INesHeader, Mirroring, Region, RomFormat } from './ines';
import { mapperName } from './mapper_names';

export const formatLabel: Readonly<Record<RomFormat, string>> = { ines: 'iNES 1.0', nes2: 'NES 2.0' };
export const mirroringLabel: Readonly<Record<Mirroring, string>> = {
  horizontal: 'Horizontal',
  vertical: 'Vertical',
  'four-screen': 'Four-screen VRAM',
};
export const consoleLabel: Readonly<Record<ConsoleType, string>> = {
  standard: 'Standard',
  'vs-system': 'VS System',
  'playchoice-10': 'PlayChoice-10',
  extended: 'Extended',
};
export const regionLabel: Readonly<Record<Region, string>> = {
  ntsc: 'NTSC',
  pal: 'PAL',
  multi: 'Multi-region',
  unknown: 'Unknown',
};

const yesNo = (b: boolean): string => (b ? 'yes' : 'no');

function ramLine(label: string, ram: number, nvram: number): string {
  let s = `${label}: ${formatSize(ram)}`;
  if (nvram) s += ` (NV: ${formatSize(nvram)})`;
  return s;
}

export function mapperLine(header: INesHeader): string {
  let s = `Mapper: ${header.mapper} (${mapperName(header.mapper)})`;
  if (header.format === 'nes2' && header.submapper) s += `, submapper ${header.submapper}`;
  return s;
}

/** Display lines describing a loaded cartridge, in a fixed order. */
export function summarizeCartridge(cart: Cartridge): string[] {
  const h = cart.header;
  const lines = [
    `Format: ${formatLabel[h.format]}`,
    mapperLine(h),
    `PRG ROM: ${formatSize(h.prgRomSize)}`,
    h.chrRomSize ? `CHR ROM: ${formatSize(h.chrRomSize)}` : 'CHR ROM: none (CHR RAM)',
    h.prgRamSize || h.prgNvramSize ? ramLine('PRG RAM', h.prgRamSize, h.prgNvramSize) : 'PRG RAM: none declared',
  ];
  if (h.chrRamSize || h.chrNvramSize) lines.push(ramLine('CHR RAM', h.chrRamSize, h.chrNvramSize));
  lines.push(
    `Mirroring: ${mirroringLabel[h.mirroring]}`,
    `Battery: ${yesNo(h.hasBattery)}`,
    `Trainer: ${yesNo(h.hasTrainer)}`,
    `Console: ${consoleLabel[h.console]}`,
    `TV system: ${regionLabel[h.region]}`,
    `PRG CRC32: ${hex32(crc32(cart.prg))}`,
  );
  if (cart.chr.length) lines.push(`CHR CRC32: ${hex32(crc32(cart.chr))}`);
  return lines;
}

export interface CartridgeInfo extends INesHeader {
  mapperName: string;
  prgCrc32: string;
  chrCrc32: string | null;
  romCrc32: string; // PRG followed by CHR, header and trainer excluded
}

/** JSON-ready description of a cartridge. */
export function cartridgeInfo(cart: Cartridge): CartridgeInfo {
  return {
    ...cart.header,
    mapperName: mapperName(cart.header.mapper),
    prgCrc32: hex32(crc32(cart.prg)),
    chrCrc32: cart.chr.length ? hex32(crc32(cart.chr)) : null,
    romCrc32: hex32(crc32Concat([cart.prg, cart.chr])),
  };
}
