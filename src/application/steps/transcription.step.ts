import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { ReportPipelineContext } from "../pipeline/report.pipeline.context";
import { IReportPipelineStep } from "../pipeline/report.pipeline.step";

export class TranscriptionStep implements IReportPipelineStep {
  readonly stage = "TRANSCRIBED" as const;

  constructor(private readonly transcriptionProvider: ITranscriptionProvider) {}

  async execute(context: ReportPipelineContext): Promise<ReportPipelineContext> {
    const transcript = await this.transcriptionProvider.transcribe(context.audioPath, {
      signal: context.signal,
    });
    return { ...context, transcript };
  }
}
