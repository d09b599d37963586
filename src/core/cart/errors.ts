export type INesErrorKind = 'TooShort' | 'BadMagic' | 'TruncatedTrainer' | 'TruncatedRom';
export type RomRegion = 'PRG' | 'CHR';

export interface INesErrorDetail {
  region?: RomRegion;
  expected?: number; // bytes the header asked for
  actual?: number;   // bytes actually available
}

export class INesError extends Error {
  readonly kind: INesErrorKind;
  readonly region?: RomRegion;
  readonly expected?: number;
  readonly actual?: number;

  constructor(kind: INesErrorKind, message: string, detail: INesErrorDetail = {}) {
    super(message);
    this.name = 'INesError';
    this.kind = kind;
    this.region = detail.region;
    this.expected = detail.expected;
    this.actual = detail.actual;
  }
}

export const isINesError = (e: unknown): e is INesError => e instanceof INesError;
