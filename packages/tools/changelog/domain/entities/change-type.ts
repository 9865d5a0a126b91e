// Change type - the closed set of tags an entry can carry

export const CHANGE_TYPES = ["Created", "Edited", "Deleted"] as const;

export type ChangeType = typeof CHANGE_TYPES[number];

export function isValidChangeType(value: string): value is ChangeType {
  const types: readonly string[] = CHANGE_TYPES;
  return types.includes(value);
}

/**
 * Case-insensitive lookup for user input ("created", "EDITED").
 * Returns null when the value names no change type.
 */
export function parseChangeType(value: string): ChangeType | null {
  const lower = value.trim().toLowerCase();
  return CHANGE_TYPES.find((type) => type.toLowerCase() === lower) ?? null;
}
