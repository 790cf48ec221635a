import { ISummarizationProvider } from "../../domain/interfaces/isummarization.provider";
import { ITemplateFiller } from "../../domain/interfaces/itemplate.filler";
import { createLogger } from "../../infrastructure/logging/logger";
import { ReportPipelineContext } from "../pipeline/report.pipeline.context";
import { IReportPipelineStep } from "../pipeline/report.pipeline.step";

export class SummarizationStep implements IReportPipelineStep {
  readonly stage = "SUMMARIZED" as const;
  private readonly logger = createLogger("SummarizationStep");

  constructor(
    private readonly summarizationProvider: ISummarizationProvider,
    private readonly templateFiller: ITemplateFiller
  ) {}

  async execute(context: ReportPipelineContext): Promise<ReportPipelineContext> {
    if (!context.transcript) {
      throw new Error("SummarizationStep requires a transcript");
    }

    const summary = await this.summarizationProvider.summarize(context.transcript, {
      guidance: await this.readGuidance(context.templatePath),
      signal: context.signal,
    });
    return { ...context, summary };
  }

  // Template problems are reported by the fill step, so guidance is best-effort
  private async readGuidance(templatePath: string): Promise<string | undefined> {
    try {
      const text = await this.templateFiller.extractText(templatePath);
      return text.length > 0 ? text : undefined;
    } catch (error) {
      this.logger.warn(`Template guidance unavailable, summarizing without it: ${
        error instanceof Error ? error.message : String(error)
      }`);
      return undefined;
    }
  }
}
