// Entry helper functions - pure domain logic for ids and timestamps

import { randomUUID } from "node:crypto";
import {
  CHANGE_TYPES,
  type ChangeType,
  isValidChangeType,
} from "./change-type.ts";
import { NotFoundError, ValidationError } from "./errors.ts";

/**
 * Convert a UUID to a base36 entry ID (25 characters).
 */
function uuidToBase36(uuid: string): string {
  const hex = uuid.replace(/-/g, "");
  const base36Chars = "0123456789abcdefghijklmnopqrstuvwxyz";
  let result = "";
  let n = BigInt("0x" + hex);

  while (n > 0n) {
    result = base36Chars[Number(n % 36n)] + result;
    n = n / 36n;
  }

  // 25 chars covers a 128-bit UUID
  return result.padStart(25, "0");
}

/**
 * Generate a new entry ID from a random (or given) UUID.
 */
export function generateEntryId(uid?: string): string {
  return uuidToBase36(uid ?? randomUUID());
}

/**
 * Get the shortest unambiguous prefix for an entry ID.
 * Minimum 5 characters, plus 1 character margin for safety.
 */
export function getShortId(id: string, allIds: readonly string[]): string {
  const minLen = 5;
  let len = minLen;

  while (len < id.length) {
    const prefix = id.slice(0, len).toLowerCase();
    const conflicts = allIds.filter((other) =>
      other !== id && other.toLowerCase().startsWith(prefix)
    );

    if (conflicts.length === 0) {
      return id.slice(0, Math.min(len + 1, id.length));
    }
    len++;
  }

  return id;
}

/**
 * Resolve a full ID or a unique case-insensitive prefix to a stored ID.
 */
export function resolveEntryId(
  prefix: string,
  allIds: readonly string[],
): string {
  if (allIds.includes(prefix)) {
    return prefix;
  }

  const lower = prefix.toLowerCase();
  const matches = allIds.filter((id) => id.toLowerCase().startsWith(lower));

  if (prefix.length === 0 || matches.length === 0) {
    throw new NotFoundError(`No entry found matching id: ${prefix}`);
  }

  if (matches.length > 1) {
    throw new ValidationError(
      "ambiguous_entry_id",
      `Ambiguous entry id prefix '${prefix}' matches ${matches.length} entries`,
    );
  }

  return matches[0];
}

/**
 * Narrow an untrusted value to a ChangeType.
 */
export function requireChangeType(value: string): ChangeType {
  if (!isValidChangeType(value)) {
    throw new ValidationError(
      "invalid_change_type",
      `Invalid change type '${value}'. Expected one of: ${
        CHANGE_TYPES.join(", ")
      }`,
    );
  }
  return value;
}

export function requireDescription(value: string): string {
  if (value.trim().length === 0) {
    throw new ValidationError(
      "invalid_description",
      "Changelog description cannot be empty",
    );
  }
  return value;
}

function getLocalOffset(date: Date): string {
  const tzOffset = -date.getTimezoneOffset();
  const sign = tzOffset >= 0 ? "+" : "-";
  const hours = String(Math.floor(Math.abs(tzOffset) / 60)).padStart(2, "0");
  const minutes = String(Math.abs(tzOffset) % 60).padStart(2, "0");
  return `${sign}${hours}:${minutes}`;
}

/**
 * Local time as ISO 8601 with offset: "2025-01-15T10:00:00+01:00".
 */
export function getLocalISOString(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hour = String(date.getHours()).padStart(2, "0");
  const minute = String(date.getMinutes()).padStart(2, "0");
  const second = String(date.getSeconds()).padStart(2, "0");

  return `${year}-${month}-${day}T${hour}:${minute}:${second}${
    getLocalOffset(date)
  }`;
}

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * "2025-02-30" is rejected: Date.parse rolls it over to March 2.
 */
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split("-").map(Number);
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  return utc.getUTCFullYear() === year &&
    utc.getUTCMonth() === month - 1 &&
    utc.getUTCDate() === day;
}

export function isValidTimestamp(value: string): boolean {
  const match = TIMESTAMP_PATTERN.exec(value);
  return match !== null && isCalendarDate(match[1]) &&
    !Number.isNaN(Date.parse(value));
}

/**
 * Normalize a user-supplied timestamp ("2024-12-15T11:15", with or without
 * seconds and offset). A missing offset gets the local one.
 * Returns null when the value is not a timestamp.
 */
export function normalizeTimestamp(value: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, date, time, seconds, zone] = match;
  if (!isCalendarDate(date)) {
    return null;
  }
  const base = `${date}T${time}:${seconds ?? "00"}`;
  const parsed = new Date(zone ? base + zone : base);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return base + (zone ?? getLocalOffset(parsed));
}

/**
 * Display form of a stored timestamp, read as written (no timezone
 * conversion): "2025-01-16T09:15:00+01:00" → "2025-01-16 09:15:00".
 * Returns null when the value is not a timestamp.
 */
export function formatTimestamp(isoTs: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(isoTs);
  if (!match) {
    return null;
  }
  const [, date, time, seconds] = match;
  if (!isCalendarDate(date)) {
    return null;
  }
  return `${date} ${time}:${seconds ?? "00"}`;
}
