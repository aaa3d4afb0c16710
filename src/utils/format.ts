/**
 * Formatting helpers for durations, paces and zoned timestamps
 */

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * 3725 → "01:02:05"
 */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds % 60)}`;
}

/**
 * Minutes per mile, e.g. 3 miles in 1500s → "8:20/mi"
 * Empty when there is no distance
 */
export function formatPace(distanceMiles: number, durationSeconds: number): string {
  if (distanceMiles <= 0 || durationSeconds <= 0) return "";

  const secondsPerMile = Math.round(durationSeconds / distanceMiles);
  const minutes = Math.floor(secondsPerMile / 60);
  return `${minutes}:${pad(secondsPerMile % 60)}/mi`;
}

/**
 * Format a run duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * UTC offset of a time zone at a given instant, as "+HH:MM"
 */
function offsetAt(instant: number, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    timeZoneName: "longOffset",
  }).formatToParts(new Date(instant));
  const name = parts.find((part) => part.type === "timeZoneName")?.value ?? "GMT";

  // "GMT" alone means UTC, otherwise "GMT-05:00"
  const match = /GMT([+-])(\d{2}):?(\d{2})?/.exec(name);
  if (!match) return "+00:00";
  return `${match[1]}${match[2]}:${match[3] ?? "00"}`;
}

function offsetMinutes(offset: string): number {
  const sign = offset.startsWith("-") ? -1 : 1;
  const [hours, minutes] = offset.slice(1).split(":").map(Number);
  return sign * (hours * 60 + minutes);
}

/**
 * ISO 8601 timestamp of a wall-clock time in a time zone
 * ("2024-03-05", 8, "America/New_York") → "2024-03-05T08:00:00-05:00"
 */
export function zonedIsoString(date: string, hour: number, timeZone: string): string {
  const [year, month, day] = date.split("-").map(Number);
  const wallClockUtc = Date.UTC(year, month - 1, day, hour);

  // Resolve the offset twice so dates next to a DST switch settle on the right one
  let offset = offsetAt(wallClockUtc, timeZone);
  offset = offsetAt(wallClockUtc - offsetMinutes(offset) * 60_000, timeZone);

  return `${date}T${pad(hour)}:00:00${offset}`;
}

/**
 * "2024-03-05" → "Tuesday"
 */
export function weekdayOf(date: string): string {
  const [year, month, day] = date.split("-").map(Number);
  return new Intl.DateTimeFormat("en-US", { weekday: "long", timeZone: "UTC" }).format(
    new Date(Date.UTC(year, month - 1, day)),
  );
}
