/**
 * Human-readable formatting helpers for progress reporting
 */

/**
 * Format file size
 */
export function formatFileSize(bytes: number): string {
  if (bytes <= 0) return 'Unknown';

  const units = ['B', 'KiB', 'MiB', 'GiB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)}${units[unitIndex]}`;
}

/**
 * Format a transfer rate in bytes per second
 */
export function formatRate(bytesPerSecond: number): string {
  return `${formatFileSize(bytesPerSecond)}/s`;
}

/**
 * Format seconds as MM:SS or H:MM:SS
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const pad = (n: number) => String(n).padStart(2, '0');
  return h > 0 ? `${h}:${pad(m)}:${pad(s)}` : `${pad(m)}:${pad(s)}`;
}

/**
 * Parse MM:SS or HH:MM:SS into seconds
 */
export function parseClock(value: string): number | undefined {
  const parts = value.trim().split(':');
  if (parts.length < 2 || parts.length > 3) return undefined;
  if (!parts.every((part) => /^\d+$/.test(part))) return undefined;
  return parts.reduce((total, part) => total * 60 + parseInt(part, 10), 0);
}

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  kib: 1024,
  mib: 1024 ** 2,
  gib: 1024 ** 3,
  kb: 1000,
  mb: 1000 ** 2,
  gb: 1000 ** 3,
};

/**
 * Convert a value like 1.23 with unit "MiB" to bytes
 */
export function parseSize(value: string, unit: string): number | undefined {
  const multiplier = SIZE_UNITS[unit.toLowerCase()];
  const parsed = parseFloat(value);
  if (multiplier === undefined || Number.isNaN(parsed)) return undefined;
  return parsed * multiplier;
}
