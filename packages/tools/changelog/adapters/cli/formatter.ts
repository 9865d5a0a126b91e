/**
 * CLI output formatters for changelog commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import { CHANGE_TYPES } from "../../domain/entities/change-type.ts";
import type { ChangelogError } from "../../domain/entities/errors.ts";
import { formatTimestamp } from "../../domain/entities/entry-helpers.ts";
import type {
  AddOutput,
  EditOutput,
  ListEntryItem,
  ListOutput,
  ReportOutput,
  ShowOutput,
  StatusOutput,
} from "../../domain/entities/outputs.ts";

const TYPE_WIDTH = Math.max(...CHANGE_TYPES.map((type) => type.length));

function displayDate(timestamp: string): string {
  return formatTimestamp(timestamp) ?? timestamp;
}

function firstLine(text: string): string {
  const [line] = text.split("\n");
  return line === text ? text : `${line} …`;
}

export function formatAdd(output: AddOutput): string {
  return output.id;
}

export function formatEdit(output: EditOutput): string {
  return `entry updated: ${output.entry.id}`;
}

export function formatStatus(output: StatusOutput): string {
  return `${output.status.replace(/_/g, " ")}: ${output.id}`;
}

function formatListItem(item: ListEntryItem): string {
  return `${item.shortId}  ${item.changeType.padEnd(TYPE_WIDTH)}  ${
    displayDate(item.timestamp)
  }  ${firstLine(item.description)}`;
}

export function formatList(output: ListOutput): string {
  if (output.entries.length === 0) {
    return "no entries";
  }
  return output.entries.map(formatListItem).join("\n");
}

export function formatShow(output: ShowOutput): string {
  const { entry } = output;
  const lines = [
    `id: ${entry.shortId}`,
    `full id: ${entry.id}`,
    `type: ${entry.changeType}`,
    `date: ${displayDate(entry.timestamp)}`,
    "",
    "description:",
    ...entry.description.split("\n").map((line) => `  ${line}`),
  ];
  return lines.join("\n");
}

export function formatReport(output: ReportOutput): string {
  const noun = output.count === 1 ? "entry" : "entries";
  return `report written: ${output.path} (${output.count} ${noun})`;
}

export function formatError(error: ChangelogError): string {
  return `error: ${error.code}\n${error.message}`;
}
