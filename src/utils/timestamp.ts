/**
 * Filename timestamps
 *
 * Local time rendered as `YYYYMMDD_HHMMSSffffff` (microsecond field). Values handed
 * out by one source are strictly increasing, so two requests in the same
 * millisecond still get distinct filenames.
 */

const pad = (value: number, width: number): string => value.toString().padStart(width, '0');

/**
 * Format a date plus a sub-millisecond offset (0-999 µs)
 */
export function formatTimestamp(date: Date, extraMicros = 0): string {
  const datePart = `${date.getFullYear()}${pad(date.getMonth() + 1, 2)}${pad(date.getDate(), 2)}`;
  const timePart = `${pad(date.getHours(), 2)}${pad(date.getMinutes(), 2)}${pad(date.getSeconds(), 2)}`;
  const micros = date.getMilliseconds() * 1000 + extraMicros;
  return `${datePart}_${timePart}${pad(micros, 6)}`;
}

export class TimestampSource {
  private lastMicros = -1;

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Next unique timestamp
   */
  next(): string {
    let micros = this.now() * 1000;
    if (micros <= this.lastMicros) {
      micros = this.lastMicros + 1;
    }
    this.lastMicros = micros;

    const epochMs = Math.floor(micros / 1000);
    return formatTimestamp(new Date(epochMs), micros - epochMs * 1000);
  }
}

export const timestampSource = new TimestampSource();
