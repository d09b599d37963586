export type Byte = number; // 0..255

// Byte range of one segment inside a ROM image.
export interface Segment {
  offset: number;
  length: number;
}
