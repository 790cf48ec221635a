import { PipelineState } from "../../domain/enums/pipeline.state";
import { throwIfAborted } from "../../domain/errors/app.errors";
import { createLogger } from "../../infrastructure/logging/logger";
import { PipelineError } from "./pipeline.error";
import { ReportPipelineContext } from "./report.pipeline.context";
import { IReportPipelineStep } from "./report.pipeline.step";

export type StateChangeListener = (state: PipelineState) => void;

/**
 * Runs the steps in order: START → <step stages…> → DONE.
 * The first failing step moves the run to FAILED and aborts the rest.
 */
export class ReportPipeline {
  private readonly logger = createLogger("ReportPipeline");

  constructor(private readonly steps: IReportPipelineStep[]) {}

  async run(
    initialContext: ReportPipelineContext,
    onStateChange?: StateChangeListener
  ): Promise<ReportPipelineContext> {
    let ctx = initialContext;
    onStateChange?.("START");
    this.logger.info(`Running ${this.steps.length} steps`);

    for (let i = 0; i < this.steps.length; i++) {
      const step = this.steps[i];
      this.logger.info(`Executing step ${i + 1}/${this.steps.length}: ${step.constructor.name}`);
      try {
        throwIfAborted(ctx.signal);
        ctx = await step.execute(ctx);
      } catch (error) {
        this.logger.error(`Step ${i + 1} (${step.constructor.name}) failed`, error);
        onStateChange?.("FAILED");
        throw new PipelineError(step.stage, error);
      }
      onStateChange?.(step.stage);
    }

    onStateChange?.("DONE");
    this.logger.info("All steps completed");
    return ctx;
  }
}
