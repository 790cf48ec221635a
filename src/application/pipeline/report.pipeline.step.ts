import { PipelineStage } from "../../domain/enums/pipeline.state";
import { ReportPipelineContext } from "./report.pipeline.context";

export interface IReportPipelineStep {
  // State reached when the step succeeds
  readonly stage: PipelineStage;
  execute(context: ReportPipelineContext): Promise<ReportPipelineContext>;
}
