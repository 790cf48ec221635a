#!/usr/bin/env node
import * as path from "path";
import { loadCliConfig, loadEnvFile } from "./infrastructure/config/app.config";
import { createOpenAIClient } from "./infrastructure/openai/openai.client";
import { OpenAITranscriptionProvider } from "./infrastructure/openai/openai.transcription.provider";
import { OpenAISummarizationProvider } from "./infrastructure/openai/openai.summarization.provider";
import { OpenAITranscriptReviewer } from "./infrastructure/openai/openai.transcript.reviewer";
import { DocxTemplateFiller } from "./infrastructure/docx/docx.template.filler";
import { FfmpegAudioSplitter } from "./infrastructure/audio/ffmpeg.audio.splitter";
import { GenerateReportUseCase } from "./application/use-cases/generate-report.use-case";
import {
  USAGE,
  breakCommand,
  dataFolders,
  parseCliArgs,
  reviewCommand,
  summarizeCommand,
  transcribeCommand,
} from "./presentation/cli/report.commands";

async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const folders = dataFolders(path.resolve("data"));

  // Local only: no OpenAI settings needed
  if (command.command === "break") {
    await breakCommand(command, folders, new FfmpegAudioSplitter());
    return 0;
  }

  loadEnvFile();
  const config = loadCliConfig();
  const openai = createOpenAIClient(config.openai);
  const reviewer = new OpenAITranscriptReviewer(openai, {
    model: config.openai.summaryModel,
    maxTokens: config.openai.summaryMaxTokens,
  });
  const transcriptionProvider = new OpenAITranscriptionProvider(openai, {
    model: config.openai.transcriptionModel,
    maxAudioBytes: config.pipeline.maxAudioBytes,
    allowedExtensions: config.pipeline.allowedAudioExtensions,
  });

  if (command.command === "review") {
    await reviewCommand(command, folders, reviewer);
    return 0;
  }

  if (command.command === "transcribe") {
    await transcribeCommand(command, folders, transcriptionProvider, reviewer);
    return 0;
  }

  const generateReportUseCase = new GenerateReportUseCase(
    transcriptionProvider,
    new OpenAISummarizationProvider(openai, {
      model: config.openai.summaryModel,
      maxTokens: config.openai.summaryMaxTokens,
    }),
    new DocxTemplateFiller(config.pipeline.templatePlaceholder)
  );
  await summarizeCommand(command, folders, generateReportUseCase);
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`✗ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
