import OpenAI from "openai";
import * as fs from "fs";
import * as path from "path";
import { ITranscriptionProvider, TranscriptionOptions } from "../../domain/interfaces/itranscription.provider";
import { Transcript } from "../../domain/entities/report";
import {
  InputValidationError,
  OperationCancelledError,
  TranscriptionServiceError,
  throwIfAborted,
} from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";
import { describeOpenAIError, isAbortError } from "./openai.client";

export interface OpenAITranscriptionProviderOptions {
  model: string;
  maxAudioBytes: number;
  allowedExtensions: readonly string[];
}

export class OpenAITranscriptionProvider implements ITranscriptionProvider {
  private readonly logger = createLogger("OpenAITranscriptionProvider");

  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAITranscriptionProviderOptions
  ) {}

  async transcribe(audioPath: string, options?: TranscriptionOptions): Promise<Transcript> {
    const size = await this.validateAudioFile(audioPath);
    throwIfAborted(options?.signal);

    this.logger.info(`Starting transcription for: ${path.basename(audioPath)}`, {
      bytes: size,
      model: this.options.model,
    });

    try {
      const response = await this.client.audio.transcriptions.create(
        {
          model: this.options.model,
          file: fs.createReadStream(audioPath),
        },
        { signal: options?.signal }
      );

      const transcript = response.text.trim();
      if (transcript.length === 0) {
        throw new TranscriptionServiceError("the service returned an empty transcript");
      }

      this.logger.info(`Transcription completed: ${transcript.length} characters`);
      return transcript;
    } catch (error) {
      if (error instanceof TranscriptionServiceError) {
        throw error;
      }
      if (isAbortError(error, options?.signal)) {
        throw new OperationCancelledError("Transcription was cancelled", { cause: error });
      }
      this.logger.error("Transcription failed", error);
      throw new TranscriptionServiceError(describeOpenAIError(error), { cause: error });
    }
  }

  /**
   * Checks existence, extension and size against the upstream limits. Returns the size in bytes.
   */
  private async validateAudioFile(audioPath: string): Promise<number> {
    const extension = path.extname(audioPath).toLowerCase();
    if (!this.options.allowedExtensions.includes(extension)) {
      throw new InputValidationError(
        `Unsupported audio format "${extension || path.basename(audioPath)}". Allowed: ${this.options.allowedExtensions.join(", ")}`
      );
    }

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(audioPath);
    } catch (error) {
      throw new InputValidationError(`Audio file not found: ${audioPath}`, { cause: error });
    }

    if (!stats.isFile()) {
      throw new InputValidationError(`Audio path is not a file: ${audioPath}`);
    }
    if (stats.size === 0) {
      throw new InputValidationError(`Audio file is empty: ${audioPath}`);
    }
    if (stats.size > this.options.maxAudioBytes) {
      throw new InputValidationError(
        `Audio file is ${stats.size} bytes, above the ${this.options.maxAudioBytes} byte limit`
      );
    }

    return stats.size;
  }
}
