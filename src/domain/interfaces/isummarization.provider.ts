import { Summary, Transcript } from "../entities/report";

export interface SummarizationOptions {
  // Plain text of the report template, used as formatting instructions
  guidance?: string;
  signal?: AbortSignal;
}

export interface ISummarizationProvider {
  summarize(transcript: Transcript, options?: SummarizationOptions): Promise<Summary>;
}
