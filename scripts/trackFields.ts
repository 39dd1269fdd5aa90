const BITRATE_PATTERN = /^(\d+)kbps$/;
const LENGTH_PATTERN = /^(\d+):([0-5]\d)$/;

/**
 * Parse a bitrate such as "746kbps". Returns null unless it is a positive
 * whole number of kbps.
 */
export function parseBitrate(value: string): number | null {
  const match = value.match(BITRATE_PATTERN);
  if (!match) return null;
  const kbps = Number.parseInt(match[1], 10);
  return kbps > 0 ? kbps : null;
}

/**
 * Parse a track length "M:SS" into seconds. Minutes are unbounded,
 * seconds must be 00-59.
 */
export function parseLength(value: string): number | null {
  const match = value.match(LENGTH_PATTERN);
  if (!match) return null;
  return Number.parseInt(match[1], 10) * 60 + Number.parseInt(match[2], 10);
}

export function formatLength(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}
