import OpenAI from "openai";
import { ITranscriptReviewer } from "../../domain/interfaces/itranscript.reviewer";
import { Transcript } from "../../domain/entities/report";
import { OperationCancelledError, ReviewServiceError, throwIfAborted } from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";
import { describeOpenAIError, isAbortError } from "./openai.client";

const REVIEW_SYSTEM_PROMPT =
  "You are a transcript reviewer and formatter. Your job is to identify speakers in conversations and organize text into proper paragraphs with clear speaker identification.";

export function buildReviewPrompt(transcript: Transcript): string {
  return `Please review and format the following transcript text. Your task is to:

1. Identify different speakers in the conversation and label them as Speaker 1, Speaker 2, Speaker 3, etc.
2. Break the text into appropriate paragraphs based on topic changes and speaker transitions
3. Format the output with proper line breaks and speaker identification

For each paragraph, start with the speaker identification like: "Speaker X: <paragraph content>"

Here is the transcript to review:

${transcript}

Please return the formatted transcript with proper speaker identification and paragraph breaks.`;
}

export class OpenAITranscriptReviewer implements ITranscriptReviewer {
  private readonly logger = createLogger("OpenAITranscriptReviewer");

  constructor(
    private readonly client: OpenAI,
    private readonly options: { model: string; maxTokens: number }
  ) {}

  async review(transcript: Transcript, options?: { signal?: AbortSignal }): Promise<string> {
    throwIfAborted(options?.signal);
    if (transcript.trim().length === 0) {
      throw new ReviewServiceError("transcript is empty");
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: "system", content: REVIEW_SYSTEM_PROMPT },
            { role: "user", content: buildReviewPrompt(transcript) },
          ],
          temperature: 0.3,
          max_completion_tokens: this.options.maxTokens,
        },
        { signal: options?.signal }
      );

      const reviewed = response.choices[0]?.message?.content?.trim() ?? "";
      if (reviewed.length === 0) {
        throw new ReviewServiceError("the service returned an empty transcript");
      }

      this.logger.info(`Transcript reviewed: ${reviewed.length} characters`);
      return reviewed;
    } catch (error) {
      if (error instanceof ReviewServiceError) {
        throw error;
      }
      if (isAbortError(error, options?.signal)) {
        throw new OperationCancelledError("Transcript review was cancelled", { cause: error });
      }
      throw new ReviewServiceError(describeOpenAIError(error), { cause: error });
    }
  }
}
