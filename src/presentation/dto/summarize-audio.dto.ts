import { z } from "zod";
import { RequestResult } from "../../domain/entities/report";

export const summarizeAudioRequestSchema = z.object({
  audio_file_locator: z
    .string({ required_error: "audio_file_locator is required" })
    .trim()
    .min(1, "audio_file_locator is required"),
  template_file_locator: z
    .string({ required_error: "template_file_locator is required" })
    .trim()
    .min(1, "template_file_locator is required"),
});

export type SummarizeAudioRequest = z.infer<typeof summarizeAudioRequestSchema>;

export type SummarizeAudioResponse = RequestResult;

export function failureResult(message: string): SummarizeAudioResponse {
  return {
    success: false,
    message,
    report_file_locator: null,
    report_download_url: null,
  };
}

export interface HealthResponse {
  status: "healthy";
  message: string;
}
