import { Transcript } from "../entities/report";

export interface TranscriptionOptions {
  signal?: AbortSignal;
}

export interface ITranscriptionProvider {
  transcribe(audioPath: string, options?: TranscriptionOptions): Promise<Transcript>;
}
