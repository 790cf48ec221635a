import * as fs from "fs/promises";
import * as path from "path";
import { parseArgs } from "util";
import { GenerateReportUseCase, defaultReportFileName } from "../../application/use-cases/generate-report.use-case";
import { ITranscriptReviewer } from "../../domain/interfaces/itranscript.reviewer";
import { ITranscriptionProvider } from "../../domain/interfaces/itranscription.provider";
import { IAudioSplitter } from "../../domain/interfaces/iaudio.splitter";
import { InputValidationError } from "../../domain/errors/app.errors";

export const DEFAULT_AUDIO_FILE = "transformer-paper-introduction.mp3";
export const DEFAULT_TEMPLATE_FILE = "default_report_template.docx";
export const DEFAULT_TRANSCRIPT_FILE = "transformer-paper-introduction.txt";
// Just under the 25 MiB transcription upload limit
export const DEFAULT_CHUNK_SIZE_MB = 24;

const BYTES_PER_MB = 1024 * 1024;

export interface DataFolders {
  audioFiles: string;
  reportTemplates: string;
  reports: string;
  transcripts: string;
}

export function dataFolders(rootDir: string): DataFolders {
  return {
    audioFiles: path.join(rootDir, "audio_files"),
    reportTemplates: path.join(rootDir, "report_templates"),
    reports: path.join(rootDir, "reports"),
    transcripts: path.join(rootDir, "transcripts"),
  };
}

export type CliCommand =
  | { command: "summarize"; audioFile: string; templateFile: string }
  | { command: "review"; transcriptFile: string }
  | { command: "transcribe"; audioFile: string }
  | { command: "break"; audioFile: string; chunkSizeMb: number }
  | { command: "help" };

export const USAGE = `Usage:
  audio-report [summarize] [--audio-file|-a <name>] [--template-file|-t <name>]
  audio-report review [--transcript-file <name>]
  audio-report transcribe [--audio-file|-a <name>]
  audio-report break [--audio-file|-a <name>] [--chunk-size-mb <size>]

Files are read from ./data/audio_files, ./data/report_templates and ./data/transcripts;
reports are written to ./data/reports, transcripts to ./data/transcripts and
audio parts next to the source file.`;

// File names only: the CLI never reads outside its data folders
function fileNameArg(value: string, flag: string): string {
  if (!value || path.basename(value) !== value) {
    throw new InputValidationError(`${flag} must be a file name, got "${value}"`);
  }
  return value;
}

function chunkSizeArg(value: string): number {
  const size = Number(value);
  if (!Number.isFinite(size) || size <= 0) {
    throw new InputValidationError(`--chunk-size-mb must be a positive number, got "${value}"`);
  }
  return size;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "audio-file": { type: "string", short: "a", default: DEFAULT_AUDIO_FILE },
      "template-file": { type: "string", short: "t", default: DEFAULT_TEMPLATE_FILE },
      "transcript-file": { type: "string", default: DEFAULT_TRANSCRIPT_FILE },
      "chunk-size-mb": { type: "string", default: String(DEFAULT_CHUNK_SIZE_MB) },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return { command: "help" };
  }

  const [command = "summarize", ...rest] = positionals;
  if (rest.length > 0) {
    throw new InputValidationError(`Unexpected arguments: ${rest.join(" ")}`);
  }

  switch (command) {
    case "summarize":
      return {
        command: "summarize",
        audioFile: fileNameArg(values["audio-file"] ?? DEFAULT_AUDIO_FILE, "--audio-file"),
        templateFile: fileNameArg(values["template-file"] ?? DEFAULT_TEMPLATE_FILE, "--template-file"),
      };
    case "review":
      return {
        command: "review",
        transcriptFile: fileNameArg(values["transcript-file"] ?? DEFAULT_TRANSCRIPT_FILE, "--transcript-file"),
      };
    case "transcribe":
      return {
        command: "transcribe",
        audioFile: fileNameArg(values["audio-file"] ?? DEFAULT_AUDIO_FILE, "--audio-file"),
      };
    case "break":
      return {
        command: "break",
        audioFile: fileNameArg(values["audio-file"] ?? DEFAULT_AUDIO_FILE, "--audio-file"),
        chunkSizeMb: chunkSizeArg(values["chunk-size-mb"] ?? String(DEFAULT_CHUNK_SIZE_MB)),
      };
    default:
      throw new InputValidationError(`Unknown command "${command}"`);
  }
}

export async function summarizeCommand(
  args: { audioFile: string; templateFile: string },
  folders: DataFolders,
  generateReportUseCase: GenerateReportUseCase
): Promise<string> {
  const audioPath = path.join(folders.audioFiles, args.audioFile);
  const templatePath = path.join(folders.reportTemplates, args.templateFile);
  const reportFileName = defaultReportFileName(args.audioFile);

  console.log("\nFiles that will be processed:");
  console.log(audioPath);
  console.log(templatePath);
  console.log("\nReport file that will be saved:");
  console.log(path.join(folders.reports, reportFileName));
  console.log("\n--------------------------------------------------------------------\n");

  const result = await generateReportUseCase.run(audioPath, templatePath, {
    outputDir: folders.reports,
    reportFileName,
    // Re-running the CLI on the same audio replaces the previous report
    overwriteReport: true,
    onStateChange: (state) => console.log(`→ ${state}`),
  });

  console.log(`✓ Report saved: ${result.reportPath}`);
  return result.reportPath;
}

/**
 * Reviews data/transcripts/<name>.txt and writes <name>_reviewed.txt next to it.
 */
export async function reviewCommand(
  args: { transcriptFile: string },
  folders: DataFolders,
  reviewer: ITranscriptReviewer
): Promise<string> {
  const fileName = args.transcriptFile.endsWith(".txt") ? args.transcriptFile : `${args.transcriptFile}.txt`;
  const transcriptPath = path.join(folders.transcripts, fileName);
  const reviewedPath = path.join(folders.transcripts, `${path.basename(fileName, ".txt")}_reviewed.txt`);

  console.log(`Input transcript: ${transcriptPath}`);
  console.log(`Output reviewed transcript: ${reviewedPath}`);

  let transcript: string;
  try {
    transcript = await fs.readFile(transcriptPath, "utf-8");
  } catch (error) {
    throw new InputValidationError(`Transcript file not found: ${transcriptPath}`, { cause: error });
  }

  const reviewed = await reviewer.review(transcript);
  await fs.mkdir(path.dirname(reviewedPath), { recursive: true });
  await fs.writeFile(reviewedPath, reviewed, "utf-8");

  console.log(`✓ Reviewed transcript saved: ${reviewedPath}`);
  return reviewedPath;
}

/**
 * Transcribes data/audio_files/<name> and writes a speaker-labelled data/transcripts/<base>.txt.
 */
export async function transcribeCommand(
  args: { audioFile: string },
  folders: DataFolders,
  transcriptionProvider: ITranscriptionProvider,
  reviewer: ITranscriptReviewer
): Promise<string> {
  const audioPath = path.join(folders.audioFiles, args.audioFile);
  const transcriptPath = path.join(
    folders.transcripts,
    `${path.basename(args.audioFile, path.extname(args.audioFile))}.txt`
  );

  console.log(`Audio file: ${audioPath}`);
  console.log(`Transcript file: ${transcriptPath}`);

  const transcript = await transcriptionProvider.transcribe(audioPath);
  const labelled = await reviewer.review(transcript);

  await fs.mkdir(folders.transcripts, { recursive: true });
  await fs.writeFile(transcriptPath, labelled, "utf-8");

  console.log(`✓ Transcript saved: ${transcriptPath}`);
  return transcriptPath;
}

export async function breakCommand(
  args: { audioFile: string; chunkSizeMb: number },
  folders: DataFolders,
  splitter: IAudioSplitter
): Promise<string[]> {
  const audioPath = path.join(folders.audioFiles, args.audioFile);
  console.log(`Audio file: ${audioPath}`);
  console.log(`Chunk size: ${args.chunkSizeMb.toFixed(2)} MB`);

  const parts = await splitter.split(audioPath, {
    maxChunkBytes: Math.floor(args.chunkSizeMb * BYTES_PER_MB),
  });

  console.log(`✓ ${parts.length} file(s):`);
  for (const part of parts) {
    console.log(`  - ${path.basename(part)}`);
  }
  return parts;
}
