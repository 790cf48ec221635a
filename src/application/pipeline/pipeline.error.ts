import { AppError, toErrorMessage } from "../../domain/errors/app.errors";
import { PipelineStage } from "../../domain/enums/pipeline.state";

/**
 * Raised when a step fails. `stage` is the state the pipeline was trying to reach;
 * status and code are inherited from the underlying error when it is an AppError.
 */
export class PipelineError extends AppError {
  readonly state = "FAILED";

  constructor(readonly stage: PipelineStage, cause: unknown) {
    super(
      `Pipeline failed at stage ${stage}: ${toErrorMessage(cause)}`,
      cause instanceof AppError ? cause.statusCode : 500,
      cause instanceof AppError ? cause.code : "PIPELINE_FAILED",
      { cause }
    );
  }
}
