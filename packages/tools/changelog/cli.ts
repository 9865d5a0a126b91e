import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import {
  formatAdd,
  formatEdit,
  formatError,
  formatList,
  formatReport,
  formatShow,
  formatStatus,
} from "./adapters/cli/formatter.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { JsonChangelogRepository } from "./adapters/repositories/json-changelog-repo.ts";
import { type ConfigFlags, resolveConfig } from "./config.ts";
import {
  CHANGE_TYPES,
  type ChangeType,
  parseChangeType,
} from "./domain/entities/change-type.ts";
import { normalizeTimestamp } from "./domain/entities/entry-helpers.ts";
import { ChangelogError, ValidationError } from "./domain/entities/errors.ts";
import { AddEntryUseCase } from "./domain/use-cases/add-entry.ts";
import { EditEntryUseCase } from "./domain/use-cases/edit-entry.ts";
import { GenerateReportUseCase } from "./domain/use-cases/generate-report.ts";
import { ListEntriesUseCase } from "./domain/use-cases/list-entries.ts";
import { RemoveEntryUseCase } from "./domain/use-cases/remove-entry.ts";
import { ShowEntryUseCase } from "./domain/use-cases/show-entry.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Wiring
// ============================================================================

interface JsonOption {
  json?: boolean;
}

interface AddOptions extends JsonOption {
  timestamp?: string;
}

interface EditOptions extends JsonOption {
  type?: string;
  desc?: string;
}

interface ListOptions extends JsonOption {
  type?: string;
}

interface ReportOptions extends JsonOption {
  output?: string;
  title?: string;
}

function createContext(flags: ConfigFlags) {
  const config = resolveConfig(flags);
  const fs = new NodeFileSystem();
  const changelogRepo = new JsonChangelogRepository(fs, config.changelogPath);
  return { config, fs, changelogRepo };
}

/**
 * CLI spelling of a change type ("created") to its stored form ("Created").
 * Unknown values pass through so the use case reports them.
 */
function toChangeType(value: string): string {
  return parseChangeType(value) ?? value;
}

function parseTimestampOption(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timestamp = normalizeTimestamp(value);
  if (!timestamp) {
    throw new ValidationError(
      "invalid_args",
      `Invalid timestamp format: ${value}. Use format YYYY-MM-DDTHH:mm[:SS][<tz>]`,
    );
  }
  return timestamp;
}

function print(json: boolean | undefined, output: unknown, text: string) {
  console.log(json ? JSON.stringify(output) : text);
}

function handleError(e: unknown, json: boolean): void {
  if (e instanceof ChangelogError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    process.exitCode = 1;
    return;
  }
  throw e;
}

// ============================================================================
// Commands
// ============================================================================

function createProgram(): Command {
  const program = new Command()
    .name("cl")
    .version(VERSION)
    .description(
      "Changelog - Record code-change notes and render them as HTML\n\n" +
        "Workflow:\n" +
        '  1. cl add created "add login form"   # Record a change (returns ID)\n' +
        '  2. cl edit <id> --desc "..."         # Fix a note\n' +
        "  3. cl list                           # Review entries\n" +
        "  4. cl report -o changelog.html       # Render the HTML report\n\n" +
        `Change types: ${CHANGE_TYPES.join(", ")} (case-insensitive)`,
    )
    .option(
      "-f, --file <path>",
      "Changelog file (default: $CHANGELOG_FILE or changelog.json)",
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    });

  const globals = () => program.opts<{ file?: string }>();

  program
    .command("add")
    .description("Record a new changelog entry")
    .argument("<changeType>", `One of: ${CHANGE_TYPES.join(", ")}`)
    .argument("<description>", "What changed")
    .option("--json", "Output as JSON")
    .option(
      "-t, --timestamp <ts>",
      "Entry time (2024-12-15T11:15[:SS][<tz>]), defaults to now",
    )
    .action(async (changeType: string, description: string, options: AddOptions) => {
      try {
        const { changelogRepo } = createContext(globals());
        const output = await new AddEntryUseCase({ changelogRepo }).execute({
          changeType: toChangeType(changeType),
          description,
          timestamp: parseTimestampOption(options.timestamp),
        });
        print(options.json, output, formatAdd(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  program
    .command("edit")
    .description("Update the change type or description of an entry")
    .argument("<id>", "Entry id or unique prefix")
    .option("--json", "Output as JSON")
    .option("--type <changeType>", "New change type")
    .option("--desc <description>", "New description")
    .action(async (id: string, options: EditOptions) => {
      try {
        const { changelogRepo } = createContext(globals());
        const output = await new EditEntryUseCase(changelogRepo).execute({
          id,
          changeType: options.type === undefined
            ? undefined
            : toChangeType(options.type),
          description: options.desc,
        });
        print(options.json, output, formatEdit(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  program
    .command("remove")
    .alias("rm")
    .description(
      "Delete an entry from the file (to keep it in the report, edit its type to Deleted instead)",
    )
    .argument("<id>", "Entry id or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: JsonOption) => {
      try {
        const { changelogRepo } = createContext(globals());
        const output = await new RemoveEntryUseCase(changelogRepo).execute(id);
        print(options.json, output, formatStatus(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  program
    .command("list")
    .description("List entries in the order they were recorded")
    .option("--json", "Output as JSON")
    .option("--type <changeType>", "Show only entries of this change type")
    .action(async (options: ListOptions) => {
      try {
        let changeType: ChangeType | undefined;
        if (options.type !== undefined) {
          changeType = parseChangeType(options.type) ?? undefined;
          if (!changeType) {
            throw new ValidationError(
              "invalid_change_type",
              `Invalid change type '${options.type}'. Expected one of: ${
                CHANGE_TYPES.join(", ")
              }`,
            );
          }
        }
        const { changelogRepo } = createContext(globals());
        const output = await new ListEntriesUseCase(changelogRepo).execute({
          changeType,
        });
        print(options.json, output, formatList(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  program
    .command("show")
    .description("Show a single entry")
    .argument("<id>", "Entry id or unique prefix")
    .option("--json", "Output as JSON")
    .action(async (id: string, options: JsonOption) => {
      try {
        const { changelogRepo } = createContext(globals());
        const output = await new ShowEntryUseCase(changelogRepo).execute(id);
        print(options.json, output, formatShow(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  program
    .command("report")
    .description("Render all entries to a static HTML file")
    .option("--json", "Output as JSON")
    .option(
      "-o, --output <path>",
      "Report path (default: $CHANGELOG_REPORT or changelog.html)",
    )
    .option("--title <title>", "Report title")
    .action(async (options: ReportOptions) => {
      try {
        const { config, fs, changelogRepo } = createContext({
          ...globals(),
          output: options.output,
          title: options.title,
        });
        const output = await new GenerateReportUseCase(changelogRepo, fs)
          .execute({
            outputPath: config.reportPath,
            title: config.reportTitle,
          });
        print(options.json, output, formatReport(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });

  return program;
}

// ============================================================================
// Main CLI
// ============================================================================

export async function main(args: string[]): Promise<void> {
  const program = createProgram();

  // Show help when no arguments provided
  if (args.length === 0) {
    program.outputHelp();
    return;
  }

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    // Help, version and usage errors were already printed by commander
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    throw e;
  }
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main(process.argv.slice(2));
}
