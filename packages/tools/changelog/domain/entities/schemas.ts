// Schemas for persisted changelog data

import { z } from "zod/mini";
import { CHANGE_TYPES } from "./change-type.ts";
import { isValidTimestamp } from "./entry-helpers.ts";

export const ChangelogEntrySchema = z.object({
  id: z.string().check(z.minLength(1)),
  changeType: z.enum(CHANGE_TYPES),
  description: z.string(),
  timestamp: z.string().check(
    z.refine(isValidTimestamp, { error: "Invalid timestamp" }),
  ),
});

export const ChangelogSchema = z.object({
  version: z.int().check(z.gte(1)),
  entries: z.array(ChangelogEntrySchema),
});

export const LegacyChangelogSchema = z.array(
  z.object({
    timestamp: z.string(),
    operation: z.string(),
    text: z.string(),
  }),
);

/**
 * One line per issue: "entries.0.changeType: Invalid option ...".
 */
export function describeIssues(
  issues: readonly { readonly path: readonly PropertyKey[]; readonly message: string }[],
): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message
    )
    .join("\n");
}
