import * as path from "path";
import { RequestResult } from "../../domain/entities/report";
import { AppError, toErrorMessage } from "../../domain/errors/app.errors";
import { withTempWorkspace } from "../../infrastructure/fs/temp.workspace";
import { createLogger } from "../../infrastructure/logging/logger";
import { LocatorResolver } from "../services/locator.resolver";
import { GenerateReportUseCase, defaultReportFileName } from "./generate-report.use-case";

export interface SummarizeAudioUseCaseParams {
  audioFileLocator: string;
  templateFileLocator: string;
  userId: string;
  signal?: AbortSignal;
}

export interface SummarizeAudioOutcome {
  statusCode: number;
  result: RequestResult;
}

export interface SummarizeAudioUseCaseOptions {
  reportsPrefix: string;
  // Parent directory for request workspaces; defaults to the OS temp dir
  workspaceBaseDir?: string;
}

export class SummarizeAudioUseCase {
  private readonly logger = createLogger("SummarizeAudio");

  constructor(
    private readonly locatorResolver: LocatorResolver,
    private readonly generateReportUseCase: GenerateReportUseCase,
    private readonly options: SummarizeAudioUseCaseOptions
  ) {}

  /**
   * Resolves both locators, runs the pipeline and publishes the report.
   * Never throws: every failure becomes a RequestResult with success=false.
   */
  async execute(params: SummarizeAudioUseCaseParams): Promise<SummarizeAudioOutcome> {
    const { audioFileLocator, templateFileLocator, userId, signal } = params;

    try {
      // Reject malformed locators before any download or temp file
      const audioLocation = this.locatorResolver.parse(audioFileLocator);
      this.locatorResolver.parse(templateFileLocator);

      const published = await withTempWorkspace(async (workspace) => {
        this.logger.info("Downloading audio file", { userId });
        const audioPath = await this.locatorResolver.resolveInput(audioFileLocator, workspace, { signal });

        this.logger.info("Downloading template file", { userId });
        const templatePath = await this.locatorResolver.resolveInput(templateFileLocator, workspace, { signal });

        const reportFileName = defaultReportFileName(path.posix.basename(audioLocation.key));
        const report = await this.generateReportUseCase.run(audioPath, templatePath, {
          outputDir: path.join(workspace.dir, "reports"),
          reportFileName,
          signal,
        });

        this.logger.info("Uploading report", { userId });
        return this.locatorResolver.publishOutput(report.reportPath, this.options.reportsPrefix, {
          userId,
          fileName: reportFileName,
          signal,
        });
      }, this.options.workspaceBaseDir);

      return {
        statusCode: 200,
        result: {
          success: true,
          message: "Audio summarization completed successfully",
          report_file_locator: published.locator,
          report_download_url: published.downloadUrl,
        },
      };
    } catch (error) {
      const statusCode = error instanceof AppError ? error.statusCode : 500;
      this.logger.error(`Request failed with status ${statusCode}`, error, { userId });

      return {
        statusCode,
        result: {
          success: false,
          message: `Failed to summarize audio: ${toErrorMessage(error)}`,
          report_file_locator: null,
          report_download_url: null,
        },
      };
    }
  }
}
