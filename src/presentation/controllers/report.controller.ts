import { Response } from "express";
import { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { SummarizeAudioUseCase } from "../../application/use-cases/summarize-audio.use-case";
import { OperationCancelledError } from "../../domain/errors/app.errors";
import {
  HealthResponse,
  SummarizeAudioRequest,
  SummarizeAudioResponse,
  failureResult,
  summarizeAudioRequestSchema,
} from "../dto/summarize-audio.dto";

export class ReportController {
  constructor(
    private readonly summarizeAudioUseCase: SummarizeAudioUseCase,
    private readonly requestTimeoutMs: number
  ) {}

  async summarize(req: AuthenticatedRequest, res: Response<SummarizeAudioResponse>): Promise<void> {
    if (!req.user) {
      res.status(401).json(failureResult("Unauthorized"));
      return;
    }

    const parsed = summarizeAudioRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => issue.message).join("; ");
      res.status(400).json(failureResult(`Invalid request: ${details}`));
      return;
    }
    const body: SummarizeAudioRequest = parsed.data;

    // Abort upstream work when the client goes away or the request runs too long
    const controller = new AbortController();
    let timedOut = false;
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort(new OperationCancelledError("Client disconnected"));
      }
    };
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new OperationCancelledError(`Request timed out after ${this.requestTimeoutMs} ms`));
    }, this.requestTimeoutMs);
    res.on("close", onClose);

    try {
      const outcome = await this.summarizeAudioUseCase.execute({
        audioFileLocator: body.audio_file_locator,
        templateFileLocator: body.template_file_locator,
        userId: req.user.userId,
        signal: controller.signal,
      });

      // A report published before the deadline fired is still a success
      const statusCode = timedOut && !outcome.result.success ? 504 : outcome.statusCode;
      if (!res.writableEnded && !res.destroyed) {
        res.status(statusCode).json(outcome.result);
      }
    } finally {
      clearTimeout(timer);
      res.off("close", onClose);
    }
  }

  health(_req: AuthenticatedRequest, res: Response<HealthResponse>): void {
    res.json({ status: "healthy", message: "Audio report service is running" });
  }
}
