// GenerateReportUseCase - Render the stored changelog to an HTML file

import { resolve } from "node:path";
import { ValidationError } from "../entities/errors.ts";
import type { ReportOutput } from "../entities/outputs.ts";
import type { ChangelogRepository } from "../ports/changelog-repository.ts";
import type { FileSystem } from "../ports/filesystem.ts";
import { countByChangeType, renderReport } from "../report/render-report.ts";

export interface GenerateReportInput {
  readonly outputPath: string;
  readonly title?: string;
}

export class GenerateReportUseCase {
  constructor(
    private readonly changelogRepo: ChangelogRepository,
    private readonly fs: FileSystem,
  ) {}

  async execute(input: GenerateReportInput): Promise<ReportOutput> {
    const changelogPath = this.changelogRepo.getChangelogPath();
    if (resolve(input.outputPath) === resolve(changelogPath)) {
      throw new ValidationError(
        "invalid_args",
        `Report path ${input.outputPath} would overwrite the changelog file ${changelogPath}`,
      );
    }

    const entries = await this.changelogRepo.load();
    const html = renderReport(entries, { title: input.title });

    await this.fs.writeFile(input.outputPath, html);

    return {
      path: input.outputPath,
      count: entries.length,
      counts: countByChangeType(entries),
    };
  }
}
