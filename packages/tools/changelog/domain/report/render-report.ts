/**
 * Static HTML report for a changelog snapshot.
 *
 * Pure: the same entries always produce the same document. Entries are
 * shown newest first; entries sharing a timestamp keep their stored order.
 */

import { CHANGE_TYPES, type ChangeType } from "../entities/change-type.ts";
import type { ChangelogEntry } from "../entities/entry.ts";
import { formatTimestamp } from "../entities/entry-helpers.ts";
import { RenderError } from "../entities/errors.ts";
import {
  ChangelogEntrySchema,
  describeIssues,
} from "../entities/schemas.ts";
import { escapeHtml } from "./escape-html.ts";

export const DEFAULT_REPORT_TITLE = "Project Changelog";

export interface RenderReportOptions {
  readonly title?: string;
}

const STYLE = `body{font-family:-apple-system,BlinkMacSystemFont,"Segoe UI",Roboto,Helvetica,Arial,sans-serif;line-height:1.6;background-color:#f4f7f9;color:#333;margin:0;padding:2em;}
.container{max-width:800px;margin:0 auto;background-color:#fff;padding:2em;border-radius:8px;box-shadow:0 4px 12px rgba(0,0,0,0.08);}
h1{color:#1a253c;border-bottom:2px solid #eef2f5;padding-bottom:0.5em;margin-top:0;}
.summary{color:#888;font-size:0.9em;}
.empty{color:#888;font-style:italic;}
.entry{padding:1em 0;border-bottom:1px solid #eef2f5;display:flex;align-items:flex-start;flex-wrap:wrap;}
.entry:last-child{border-bottom:none;}
.tag{font-weight:600;padding:0.2em 0.6em;border-radius:12px;color:#fff;font-size:0.85em;margin-right:1em;flex-shrink:0;}
.tag.created{background-color:#28a745;}
.tag.edited{background-color:#007bff;}
.tag.deleted{background-color:#dc3545;}
.text{flex-grow:1;word-break:break-word;white-space:pre-wrap;}
.date{font-size:0.8em;color:#888;margin-left:1.5em;flex-shrink:0;align-self:center;}
@media (max-width:600px){.entry{flex-direction:column;}.date{margin-left:0;margin-top:0.5em;}}`;

type RenderableEntry = {
  readonly entry: ChangelogEntry;
  readonly time: number;
  readonly displayDate: string;
};

function prepare(entry: ChangelogEntry, position: number): RenderableEntry {
  const result = ChangelogEntrySchema.safeParse(entry);
  if (!result.success) {
    throw new RenderError(
      `Malformed entry at position ${position}:\n${
        describeIssues(result.error.issues)
      }`,
    );
  }
  const displayDate = formatTimestamp(entry.timestamp);
  if (displayDate === null) {
    throw new RenderError(
      `Malformed entry at position ${position}: invalid timestamp`,
    );
  }
  return { entry, time: Date.parse(entry.timestamp), displayDate };
}

export function countByChangeType(
  entries: readonly ChangelogEntry[],
): Record<ChangeType, number> {
  const counts: Record<ChangeType, number> = {
    Created: 0,
    Edited: 0,
    Deleted: 0,
  };
  for (const entry of entries) {
    counts[entry.changeType]++;
  }
  return counts;
}

function renderSummary(entries: readonly ChangelogEntry[]): string {
  const counts = countByChangeType(entries);
  const parts = CHANGE_TYPES.map((type) =>
    `${counts[type]} ${type.toLowerCase()}`
  );
  const noun = entries.length === 1 ? "entry" : "entries";
  return `<p class="summary">${entries.length} ${noun}: ${
    parts.join(", ")
  }</p>`;
}

function renderEntry({ entry, displayDate }: RenderableEntry): string {
  return `<div class="entry">
<span class="tag ${entry.changeType.toLowerCase()}">${entry.changeType}</span>
<span class="text">${escapeHtml(entry.description)}</span>
<time class="date" datetime="${escapeHtml(entry.timestamp)}">${displayDate}</time>
</div>`;
}

export function renderReport(
  entries: readonly ChangelogEntry[],
  options: RenderReportOptions = {},
): string {
  const title = escapeHtml(options.title ?? DEFAULT_REPORT_TITLE);

  const rows = entries
    .map(prepare)
    .sort((a, b) => b.time - a.time);

  const body = rows.length === 0
    ? `<p class="empty">No changelog entries yet.</p>`
    : rows.map(renderEntry).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>
${STYLE}
</style>
</head>
<body>
<div class="container">
<h1>${title}</h1>
${renderSummary(entries)}
${body}
</div>
</body>
</html>
`;
}
