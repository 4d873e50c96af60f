import { v4 as uuidv4, validate as uuidValidate } from "uuid";

/**
 * Destination keys look like `YYYY/MM/DD/HH/MM/SS/<uuid>`:
 * - seven slash-delimited segments
 * - timestamp in the host's local time zone
 * - last segment is a freshly generated v4 uuid
 *
 * The metadata stage reads the uuid back out as the registration id, so any
 * change here has to be mirrored in parseDestinationKey.
 */

const SEGMENTS = 7;

export interface ParsedDestinationKey {
  timestamp: Date;
  uniqueId: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatKeyTimestamp(date: Date): string {
  return [
    pad(date.getFullYear(), 4),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("/");
}

export function generateDestinationKey(
  now: Date = new Date(),
  uniqueId: string = uuidv4(),
): string {
  return `${formatKeyTimestamp(now)}/${uniqueId}`;
}

/** Returns null when the key does not follow the destination key format. */
export function parseDestinationKey(key: string): ParsedDestinationKey | null {
  const parts = key.split("/");
  if (parts.length !== SEGMENTS) return null;

  const numbers = parts.slice(0, 6);
  if (!numbers.every((p, i) => /^\d+$/.test(p) && p.length === (i === 0 ? 4 : 2))) {
    return null;
  }
  const [year, month, day, hour, minute, second] = numbers.map(Number);
  const timestamp = new Date(year, month - 1, day, hour, minute, second);
  // Date rolls over out-of-range fields (month 13, day 32, ...)
  if (formatKeyTimestamp(timestamp) !== numbers.join("/")) return null;

  const uniqueId = parts[6];
  if (!uuidValidate(uniqueId)) return null;

  return { timestamp, uniqueId };
}

export function extractUniqueId(key: string): string | null {
  return parseDestinationKey(key)?.uniqueId ?? null;
}
