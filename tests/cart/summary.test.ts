import { describe, it, expect } from 'vitest';
import { parseINes } from '@core/cart/cartridge';
import { cartridgeInfo, mapperLine, summarizeCartridge } from '@core/cart/summary';
import { parseINesHeader } from '@core/cart/ines';
import { makeHeader, makeRom } from '@test/helpers/ines';

describe('summarizeCartridge', () => {
  it('describes an iNES 1.0 MMC3 cartridge', () => {
    const cart = parseINes(makeRom({ mapper: 4, prgBanks16k: 2, chrBanks8k: 1, mirroring: 'vertical', battery: true }));
    expect(summarizeCartridge(cart)).toEqual([
      'Format: iNES 1.0',
      'Mapper: 4 (MMC3 (TxROM))',
      'PRG ROM: 32 KB',
      'CHR ROM: 8 KB',
      'PRG RAM: 8 KB',
      'Mirroring: Vertical',
      'Battery: yes',
      'Trainer: no',
      'Console: Standard',
      'TV system: NTSC',
      'PRG CRC32: 0769EB5C',
      'CHR CRC32: 4B4E2763',
    ]);
  });

  it('describes a NES 2.0 CHR RAM cartridge', () => {
    const cart = parseINes(makeRom({
      format: 'nes2', mapper: 4, submapper: 1, chrBanks8k: 0,
      prgRamNibble: 7, chrRamNibble: 7, region: 'multi', console: 'vs-system',
    }));
    expect(summarizeCartridge(cart)).toEqual([
      'Format: NES 2.0',
      'Mapper: 4 (MMC3 (TxROM)), submapper 1',
      'PRG ROM: 16 KB',
      'CHR ROM: none (CHR RAM)',
      'PRG RAM: 8 KB',
      'CHR RAM: 8 KB',
      'Mirroring: Horizontal',
      'Battery: no',
      'Trainer: no',
      'Console: VS System',
      'TV system: Multi-region',
      'PRG CRC32: 74E0542D',
    ]);
  });

  it('shows NVRAM next to RAM and marks missing PRG RAM', () => {
    const nv = parseINes(makeRom({ format: 'nes2', prgNvNibble: 7, chrNvNibble: 1 }));
    const lines = summarizeCartridge(nv);
    expect(lines[4]).toBe('PRG RAM: 0 B (NV: 8 KB)');
    expect(lines[5]).toBe('CHR RAM: 0 B (NV: 128 B)');
    const none = parseINes(makeRom({ mapper: 2 }));
    expect(summarizeCartridge(none)[4]).toBe('PRG RAM: none declared');
  });

  it('labels four-screen, PlayChoice-10 and PAL', () => {
    const cart = parseINes(makeRom({ mirroring: 'four-screen', console: 'playchoice-10', region: 'pal', trainer: true }));
    const lines = summarizeCartridge(cart);
    expect(lines).toContain('Mirroring: Four-screen VRAM');
    expect(lines).toContain('Console: PlayChoice-10');
    expect(lines).toContain('TV system: PAL');
    expect(lines).toContain('Trainer: yes');
  });
});

describe('mapperLine', () => {
  it('omits submapper 0 and unknown names fall back', () => {
    expect(mapperLine(parseINesHeader(makeHeader({ format: 'nes2', mapper: 3000 })))).toBe('Mapper: 3000 (Unknown/Custom)');
  });
});

describe('cartridgeInfo', () => {
  it('adds names and checksums to the header fields', () => {
    const cart = parseINes(makeRom({ prgBanks16k: 2 }));
    const info = cartridgeInfo(cart);
    expect(info).toMatchObject({
      format: 'ines',
      mapper: 0,
      mapperName: 'NROM',
      prgRomSize: 32768,
      prgCrc32: '0769EB5C',
      chrCrc32: '4B4E2763',
      romCrc32: 'F66C2920',
    });
    expect(JSON.parse(JSON.stringify(info))).toEqual(info);
  });

  it('has no CHR checksum without CHR ROM', () => {
    const info = cartridgeInfo(parseINes(makeRom({ chrBanks8k: 0 })));
    expect(info.chrCrc32).toBeNull();
    expect(info.romCrc32).toBe(info.prgCrc32);
  });
});
