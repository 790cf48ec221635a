import { ITemplateFiller } from "../../domain/interfaces/itemplate.filler";
import { ReportPipelineContext } from "../pipeline/report.pipeline.context";
import { IReportPipelineStep } from "../pipeline/report.pipeline.step";

export class TemplateFillStep implements IReportPipelineStep {
  readonly stage = "FILLED" as const;

  constructor(private readonly templateFiller: ITemplateFiller) {}

  async execute(context: ReportPipelineContext): Promise<ReportPipelineContext> {
    if (context.summary === undefined) {
      throw new Error("TemplateFillStep requires a summary");
    }

    const reportPath = await this.templateFiller.fill(context.templatePath, context.summary, {
      outputDir: context.outputDir,
      fileName: context.reportFileName,
      overwrite: context.overwriteReport,
    });
    return { ...context, reportPath };
  }
}
