import * as path from "path";
import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { ISummarizationProvider } from "../../domain/interfaces/isummarization.provider";
import { ITemplateFiller } from "../../domain/interfaces/itemplate.filler";
import { Report } from "../../domain/entities/report";
import { ReportPipeline, StateChangeListener } from "../pipeline/report.pipeline";
import { TranscriptionStep } from "../steps/transcription.step";
import { SummarizationStep } from "../steps/summarization.step";
import { TemplateFillStep } from "../steps/template.fill.step";

export interface GenerateReportOptions {
  outputDir: string;
  reportFileName?: string;
  overwriteReport?: boolean;
  signal?: AbortSignal;
  onStateChange?: StateChangeListener;
}

export interface GenerateReportResult extends Report {
  state: "DONE";
}

/**
 * "intro.mp3" → "intro_report.docx"
 */
export function defaultReportFileName(audioPath: string): string {
  const base = path.basename(audioPath, path.extname(audioPath)) || "audio";
  return `${base}_report.docx`;
}

/**
 * Pipeline orchestrator: transcription → summarization → template fill.
 * Works on local paths only; remote locators are resolved by the caller.
 */
export class GenerateReportUseCase {
  private readonly pipeline: ReportPipeline;

  constructor(
    transcriptionProvider: ITranscriptionProvider,
    summarizationProvider: ISummarizationProvider,
    templateFiller: ITemplateFiller
  ) {
    this.pipeline = new ReportPipeline([
      new TranscriptionStep(transcriptionProvider),
      new SummarizationStep(summarizationProvider, templateFiller),
      new TemplateFillStep(templateFiller),
    ]);
  }

  async run(audioPath: string, templatePath: string, options: GenerateReportOptions): Promise<GenerateReportResult> {
    const ctx = await this.pipeline.run(
      {
        audioPath,
        templatePath,
        outputDir: options.outputDir,
        reportFileName: options.reportFileName ?? defaultReportFileName(audioPath),
        overwriteReport: options.overwriteReport,
        signal: options.signal,
      },
      options.onStateChange
    );

    if (!ctx.reportPath || ctx.transcript === undefined || ctx.summary === undefined) {
      throw new Error("Pipeline finished without producing a report");
    }

    return {
      state: "DONE",
      reportPath: ctx.reportPath,
      transcript: ctx.transcript,
      summary: ctx.summary,
    };
  }
}
