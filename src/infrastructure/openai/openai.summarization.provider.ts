import OpenAI from "openai";
import { ISummarizationProvider, SummarizationOptions } from "../../domain/interfaces/isummarization.provider";
import { Summary, Transcript } from "../../domain/entities/report";
import { OperationCancelledError, SummarizationServiceError, throwIfAborted } from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";
import { describeOpenAIError, isAbortError } from "./openai.client";

export const SUMMARY_SYSTEM_PROMPT =
  "You are a professional report writer. Create clear, well-structured reports.";

export function buildSummaryPrompt(transcript: Transcript, guidance?: string): string {
  const sections = [
    guidance
      ? "Based on the following audio transcript and template, generate a comprehensive report."
      : "Based on the following audio transcript, generate a comprehensive report.",
    `Transcript:\n${transcript}`,
  ];

  if (guidance) {
    sections.push(`Template Content:\n${guidance}`);
    sections.push(
      "Format the report according to the template instructions, in a structured, professional manner suitable for a business document."
    );
  } else {
    sections.push("Write it in a structured, professional manner suitable for a business document.");
  }

  return sections.join("\n\n");
}

export interface OpenAISummarizationProviderOptions {
  model: string;
  maxTokens: number;
}

export class OpenAISummarizationProvider implements ISummarizationProvider {
  private readonly logger = createLogger("OpenAISummarizationProvider");

  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAISummarizationProviderOptions
  ) {}

  async summarize(transcript: Transcript, options?: SummarizationOptions): Promise<Summary> {
    throwIfAborted(options?.signal);
    this.logger.info(`Summarizing transcript: ${transcript.length} characters`, {
      model: this.options.model,
      withTemplate: Boolean(options?.guidance),
    });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: "system", content: SUMMARY_SYSTEM_PROMPT },
            { role: "user", content: buildSummaryPrompt(transcript, options?.guidance) },
          ],
          max_completion_tokens: this.options.maxTokens,
        },
        { signal: options?.signal }
      );

      const summary = response.choices[0]?.message?.content?.trim() ?? "";
      if (summary.length === 0) {
        throw new SummarizationServiceError("the service returned an empty summary");
      }

      this.logger.info(`Summary generated: ${summary.length} characters`);
      return summary;
    } catch (error) {
      if (error instanceof SummarizationServiceError) {
        throw error;
      }
      if (isAbortError(error, options?.signal)) {
        throw new OperationCancelledError("Summarization was cancelled", { cause: error });
      }
      this.logger.error("Summarization failed", error);
      throw new SummarizationServiceError(describeOpenAIError(error), { cause: error });
    }
  }
}
