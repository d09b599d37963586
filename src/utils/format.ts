const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/**
 * Human-readable byte count. Scales by 1024 up to GB; whole results print
 * without a fraction ("32 KB"), others with one decimal ("1.5 KB").
 */
export function formatSize(bytes: number): string {
  if (bytes < 0) return `-${formatSize(-bytes)}`;
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  let text = Number.isInteger(value) ? String(value) : value.toFixed(1);
  // rounding can land on the next unit (1048575 -> "1024.0 KB")
  if (text === '1024.0' && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
    text = value.toFixed(1);
  }
  return `${text} ${SIZE_UNITS[unit]}`;
}

export const hex32 = (n: number): string => (n >>> 0).toString(16).toUpperCase().padStart(8, '0');
