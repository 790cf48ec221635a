import { Transcript } from "../entities/report";

export interface ITranscriptReviewer {
  review(transcript: Transcript, options?: { signal?: AbortSignal }): Promise<string>;
}
