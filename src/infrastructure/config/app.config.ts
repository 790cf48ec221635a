/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values.
 * Loaded once at process start; the returned object is frozen.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../../domain/errors/app.errors";

export const DEFAULT_AUDIO_EXTENSIONS = [
  ".mp3",
  ".wav",
  ".m4a",
  ".flac",
  ".mp4",
  ".mpeg",
  ".mpga",
  ".ogg",
  ".webm",
] as const;

export interface OpenAIConfig {
  apiKey: string;
  transcriptionModel: string;
  summaryModel: string;
  summaryMaxTokens: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface PipelineConfig {
  maxAudioBytes: number;
  allowedAudioExtensions: string[];
  templatePlaceholder: string;
}

export interface CliConfig {
  openai: OpenAIConfig;
  pipeline: PipelineConfig;
}

export interface AppConfig extends CliConfig {
  // Server
  host: string;
  port: number;
  frontendUrl: string;
  requestTimeoutMs: number;

  // AWS S3
  aws: {
    region: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
    s3Bucket: string;
    s3Endpoint?: string; // For S3-compatible services
    s3ForcePathStyle: boolean; // Use path-style addressing
    reportsPrefix: string;
    presignedUrlTtlSeconds: number;
  };

  // JWT
  jwt: {
    secret: string;
  };
}

type Env = Record<string, string | undefined>;

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const positiveInt = (fallback: number) =>
  optionalString.pipe(z.coerce.number().int().positive().optional()).transform((v) => v ?? fallback);

const nonNegativeInt = (fallback: number) =>
  optionalString.pipe(z.coerce.number().int().nonnegative().optional()).transform((v) => v ?? fallback);

const requiredString = z
  .string({ required_error: "is required" })
  .trim()
  .min(1, "is required");

const cliSchema = z.object({
  OPENAI_API_KEY: requiredString,
  OPENAI_TRANSCRIPTION_MODEL: optionalString.transform((v) => v ?? "whisper-1"),
  OPENAI_SUMMARY_MODEL: optionalString.transform((v) => v ?? "gpt-4.1"),
  OPENAI_SUMMARY_MAX_TOKENS: positiveInt(4000),
  OPENAI_TIMEOUT_MS: positiveInt(10 * 60 * 1000),
  OPENAI_MAX_RETRIES: nonNegativeInt(0),
  MAX_AUDIO_BYTES: positiveInt(25 * 1024 * 1024), // OpenAI's upload limit
  ALLOWED_AUDIO_EXTENSIONS: optionalString.transform((v) =>
    v
      ? v
          .split(",")
          .map((ext) => ext.trim().toLowerCase())
          .filter((ext) => ext.length > 0)
          .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`))
      : [...DEFAULT_AUDIO_EXTENSIONS]
  ),
  TEMPLATE_PLACEHOLDER: optionalString
    .transform((v) => v ?? "summary")
    .pipe(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a simple identifier")),
});

const serverSchema = cliSchema
  .extend({
    API_HOST: optionalString.transform((v) => v ?? "0.0.0.0"),
    API_PORT: positiveInt(8000),
    FRONTEND_URL: optionalString
      .transform((v) => v ?? "http://localhost:3000")
      .pipe(z.string().url()),
    REQUEST_TIMEOUT_MS: positiveInt(15 * 60 * 1000),
    AWS_REGION: optionalString,
    AWS_DEFAULT_REGION: optionalString,
    AWS_ACCESS_KEY_ID: optionalString,
    AWS_SECRET_ACCESS_KEY: optionalString,
    S3_BUCKET: requiredString,
    S3_ENDPOINT: optionalString.pipe(z.string().url().optional()),
    S3_FORCE_PATH_STYLE: optionalString.transform((v) => v === "true"),
    REPORTS_PREFIX: optionalString.transform((v) => (v ?? "reports").replace(/^\/+|\/+$/g, "")),
    PRESIGNED_URL_TTL_SECONDS: positiveInt(60 * 60),
    JWT_SECRET: requiredString,
  })
  .superRefine((env, ctx) => {
    // Static credentials come as a pair; otherwise the SDK default chain applies
    if (Boolean(env.AWS_ACCESS_KEY_ID) !== Boolean(env.AWS_SECRET_ACCESS_KEY)) {
      const missing = env.AWS_ACCESS_KEY_ID ? "AWS_SECRET_ACCESS_KEY" : "AWS_ACCESS_KEY_ID";
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [missing],
        message: "must be set together with its pair",
      });
    }
  });

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const names = Array.from(new Set(parsed.error.issues.map((issue) => String(issue.path[0]))));
    const details = parsed.error.issues.map((issue) => `${String(issue.path[0])} ${issue.message}`);
    throw new ConfigurationError(names, `Invalid configuration: ${details.join("; ")}`);
  }
  return parsed.data;
}

function toCliConfig(env: z.output<typeof cliSchema>): CliConfig {
  return {
    openai: {
      apiKey: env.OPENAI_API_KEY,
      transcriptionModel: env.OPENAI_TRANSCRIPTION_MODEL,
      summaryModel: env.OPENAI_SUMMARY_MODEL,
      summaryMaxTokens: env.OPENAI_SUMMARY_MAX_TOKENS,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
      maxRetries: env.OPENAI_MAX_RETRIES,
    },
    pipeline: {
      maxAudioBytes: env.MAX_AUDIO_BYTES,
      allowedAudioExtensions: env.ALLOWED_AUDIO_EXTENSIONS,
      templatePlaceholder: env.TEMPLATE_PLACEHOLDER,
    },
  };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Configuration for the command-line entry point: only the OpenAI settings are required.
 */
export function loadCliConfig(env: Env = process.env): Readonly<CliConfig> {
  return deepFreeze(toCliConfig(parseEnv(cliSchema, env)));
}

/**
 * Configuration for the HTTP server. Throws ConfigurationError naming every
 * missing or malformed variable.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const parsed = parseEnv(serverSchema, env);

  return deepFreeze({
    ...toCliConfig(parsed),
    host: parsed.API_HOST,
    port: parsed.API_PORT,
    frontendUrl: parsed.FRONTEND_URL,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    aws: {
      region: parsed.AWS_REGION ?? parsed.AWS_DEFAULT_REGION ?? "us-east-1",
      credentials:
        parsed.AWS_ACCESS_KEY_ID && parsed.AWS_SECRET_ACCESS_KEY
          ? {
              accessKeyId: parsed.AWS_ACCESS_KEY_ID,
              secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
            }
          : undefined,
      s3Bucket: parsed.S3_BUCKET,
      s3Endpoint: parsed.S3_ENDPOINT,
      s3ForcePathStyle: parsed.S3_FORCE_PATH_STYLE,
      reportsPrefix: parsed.REPORTS_PREFIX,
      presignedUrlTtlSeconds: parsed.PRESIGNED_URL_TTL_SECONDS,
    },
    jwt: {
      secret: parsed.JWT_SECRET,
    },
  });
}

/**
 * Loads the .env file into process.env. Called once by the entry points.
 */
export function loadEnvFile(): void {
  dotenv.config();
}
