import { AppConfig, loadConfig, loadEnvFile } from "./infrastructure/config/app.config";
import { createOpenAIClient } from "./infrastructure/openai/openai.client";
import { OpenAITranscriptionProvider } from "./infrastructure/openai/openai.transcription.provider";
import { OpenAISummarizationProvider } from "./infrastructure/openai/openai.summarization.provider";
import { DocxTemplateFiller } from "./infrastructure/docx/docx.template.filler";
import { S3ObjectStorage } from "./infrastructure/aws/s3.object.storage";
import { JwtIdentityVerifier } from "./infrastructure/auth/jwt.identity.verifier";
import { LocatorResolver } from "./application/services/locator.resolver";
import { GenerateReportUseCase } from "./application/use-cases/generate-report.use-case";
import { SummarizeAudioUseCase } from "./application/use-cases/summarize-audio.use-case";
import { ReportController } from "./presentation/controllers/report.controller";
import { createApp } from "./app";

function loadConfigOrExit(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error) {
    console.error("Failed to start server:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

function main() {
  loadEnvFile();
  const config = loadConfigOrExit();

  // Initialize infrastructure
  const openai = createOpenAIClient(config.openai);
  const transcriptionProvider = new OpenAITranscriptionProvider(openai, {
    model: config.openai.transcriptionModel,
    maxAudioBytes: config.pipeline.maxAudioBytes,
    allowedExtensions: config.pipeline.allowedAudioExtensions,
  });
  const summarizationProvider = new OpenAISummarizationProvider(openai, {
    model: config.openai.summaryModel,
    maxTokens: config.openai.summaryMaxTokens,
  });
  const templateFiller = new DocxTemplateFiller(config.pipeline.templatePlaceholder);
  const storage = new S3ObjectStorage({
    region: config.aws.region,
    credentials: config.aws.credentials,
    endpoint: config.aws.s3Endpoint,
    forcePathStyle: config.aws.s3ForcePathStyle,
  });
  const identityVerifier = new JwtIdentityVerifier(config.jwt.secret);

  // Initialize use cases
  const locatorResolver = new LocatorResolver(storage, {
    bucket: config.aws.s3Bucket,
    downloadUrlTtlSeconds: config.aws.presignedUrlTtlSeconds,
  });
  const generateReportUseCase = new GenerateReportUseCase(
    transcriptionProvider,
    summarizationProvider,
    templateFiller
  );
  const summarizeAudioUseCase = new SummarizeAudioUseCase(locatorResolver, generateReportUseCase, {
    reportsPrefix: config.aws.reportsPrefix,
  });

  const reportController = new ReportController(summarizeAudioUseCase, config.requestTimeoutMs);
  const app = createApp({ reportController, identityVerifier, frontendUrl: config.frontendUrl });

  const port = config.port;
  const host = config.host;
  const server = app.listen(port, host, () => {
    console.log(`Audio report service running on http://${host}:${port}`);
    console.log(`Health check: http://${host}:${port}/api/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main();
