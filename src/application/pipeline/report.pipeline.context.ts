import { Summary, Transcript } from "../../domain/entities/report";

export interface ReportPipelineContext {
  audioPath: string;
  templatePath: string;
  outputDir: string;
  reportFileName: string;
  overwriteReport?: boolean;
  signal?: AbortSignal;
  transcript?: Transcript;
  summary?: Summary;
  reportPath?: string;
}
