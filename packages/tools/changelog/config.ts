// Configuration - file locations and report defaults
//
// Precedence: CLI flag, then environment variable, then default.

import { DEFAULT_REPORT_TITLE } from "./domain/report/render-report.ts";

export const DEFAULT_CHANGELOG_FILE = "changelog.json";
export const DEFAULT_REPORT_FILE = "changelog.html";

export interface ChangelogConfig {
  readonly changelogPath: string;
  readonly reportPath: string;
  readonly reportTitle: string;
}

export interface ConfigFlags {
  readonly file?: string;
  readonly output?: string;
  readonly title?: string;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Blank values count as unset. */
function nonBlank(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export function resolveConfig(
  flags: ConfigFlags = {},
  env: Env = process.env,
): ChangelogConfig {
  return {
    changelogPath: nonBlank(flags.file) ?? nonBlank(env.CHANGELOG_FILE) ??
      DEFAULT_CHANGELOG_FILE,
    reportPath: nonBlank(flags.output) ?? nonBlank(env.CHANGELOG_REPORT) ??
      DEFAULT_REPORT_FILE,
    reportTitle: nonBlank(flags.title) ?? nonBlank(env.CHANGELOG_TITLE) ??
      DEFAULT_REPORT_TITLE,
  };
}
