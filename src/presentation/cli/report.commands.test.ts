import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_AUDIO_FILE,
  DEFAULT_TEMPLATE_FILE,
  DataFolders,
  breakCommand,
  dataFolders,
  parseCliArgs,
  reviewCommand,
  summarizeCommand,
  transcribeCommand,
} from "./report.commands";
import { GenerateReportUseCase } from "../../application/use-cases/generate-report.use-case";
import { ITranscriptReviewer } from "../../domain/interfaces/itranscript.reviewer";
import { IAudioSplitter } from "../../domain/interfaces/iaudio.splitter";
import { DocxTemplateFiller } from "../../infrastructure/docx/docx.template.filler";
import { buildDocx, readDocxParagraphs } from "../../testing/docx.fixtures";
import { InputValidationError } from "../../domain/errors/app.errors";
import { FakeSummarizationProvider, FakeTemplateFiller, FakeTranscriptionProvider } from "../../testing/fakes";

describe("parseCliArgs", () => {
  it("summarizes the bundled sample by default", () => {
    expect(parseCliArgs([])).toEqual({
      command: "summarize",
      audioFile: DEFAULT_AUDIO_FILE,
      templateFile: DEFAULT_TEMPLATE_FILE,
    });
  });

  it("reads file names from flags", () => {
    expect(parseCliArgs(["summarize", "-a", "standup.wav", "--template-file", "weekly.docx"])).toEqual({
      command: "summarize",
      audioFile: "standup.wav",
      templateFile: "weekly.docx",
    });
  });

  it("parses the review command", () => {
    expect(parseCliArgs(["review", "--transcript-file", "standup"])).toEqual({
      command: "review",
      transcriptFile: "standup",
    });
  });

  it("shows help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
  });

  it("rejects paths outside the data folders", () => {
    expect(() => parseCliArgs(["-a", "../secrets.mp3"])).toThrow(
      '--audio-file must be a file name, got "../secrets.mp3"'
    );
  });

  it("parses the transcribe and break commands", () => {
    expect(parseCliArgs(["transcribe", "-a", "standup.mp3"])).toEqual({
      command: "transcribe",
      audioFile: "standup.mp3",
    });
    expect(parseCliArgs(["break", "-a", "lecture.mp3", "--chunk-size-mb", "10.5"])).toEqual({
      command: "break",
      audioFile: "lecture.mp3",
      chunkSizeMb: 10.5,
    });
    expect(parseCliArgs(["break"])).toEqual({ command: "break", audioFile: DEFAULT_AUDIO_FILE, chunkSizeMb: 24 });
  });

  it("rejects a chunk size that is not a positive number", () => {
    expect(() => parseCliArgs(["break", "--chunk-size-mb", "0"])).toThrow(
      '--chunk-size-mb must be a positive number, got "0"'
    );
    expect(() => parseCliArgs(["break", "--chunk-size-mb", "ten"])).toThrow(InputValidationError);
  });

  it("rejects unknown commands and extra arguments", () => {
    expect(() => parseCliArgs(["transcribe"])).toThrow('Unknown command "transcribe"');
    expect(() => parseCliArgs(["summarize", "extra"])).toThrow(InputValidationError);
  });
});

describe("CLI commands", () => {
  let root: string;
  let folders: DataFolders;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    root = await fs.mkdtemp(path.join(os.tmpdir(), "cli-test-"));
    folders = dataFolders(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes the report into the reports folder", async () => {
    const transcription = new FakeTranscriptionProvider("spoken words");
    const useCase = new GenerateReportUseCase(
      transcription,
      new FakeSummarizationProvider("Written summary."),
      new FakeTemplateFiller()
    );

    const reportPath = await summarizeCommand(
      { audioFile: "standup.wav", templateFile: "weekly.docx" },
      folders,
      useCase
    );

    expect(reportPath).toBe(path.join(root, "reports", "standup_report.docx"));
    expect(transcription.calls).toEqual([path.join(root, "audio_files", "standup.wav")]);
    expect(await fs.readFile(reportPath, "utf8")).toBe("Written summary.");
  });

  it("writes the reviewed transcript next to the original", async () => {
    await fs.mkdir(folders.transcripts, { recursive: true });
    await fs.writeFile(path.join(folders.transcripts, "standup.txt"), "hello hi");
    const reviewer: ITranscriptReviewer = {
      review: vi.fn(async (transcript: string) => `Speaker 1: ${transcript}`),
    };

    const reviewedPath = await reviewCommand({ transcriptFile: "standup" }, folders, reviewer);

    expect(reviewedPath).toBe(path.join(root, "transcripts", "standup_reviewed.txt"));
    expect(await fs.readFile(reviewedPath, "utf8")).toBe("Speaker 1: hello hi");
  });

  it("fails when the transcript does not exist", async () => {
    const reviewer: ITranscriptReviewer = { review: vi.fn(async () => "unused") };

    await expect(reviewCommand({ transcriptFile: "missing.txt" }, folders, reviewer)).rejects.toThrow(
      `Transcript file not found: ${path.join(root, "transcripts", "missing.txt")}`
    );
    expect(reviewer.review).not.toHaveBeenCalled();
  });

  it("replaces the previous report when run again on the same audio", async () => {
    await fs.mkdir(folders.reportTemplates, { recursive: true });
    await fs.writeFile(path.join(folders.reportTemplates, "weekly.docx"), buildDocx(["Weekly", "{{summary}}"]));
    const run = (summary: string) =>
      summarizeCommand(
        { audioFile: "standup.wav", templateFile: "weekly.docx" },
        folders,
        new GenerateReportUseCase(
          new FakeTranscriptionProvider("spoken words"),
          new FakeSummarizationProvider(summary),
          new DocxTemplateFiller()
        )
      );

    await run("First summary.");
    const reportPath = await run("Second summary.");

    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual(["Weekly", "Second summary."]);
    expect(await fs.readdir(folders.reports)).toEqual(["standup_report.docx"]);
  });

  it("transcribes audio into a speaker-labelled transcript", async () => {
    const transcription = new FakeTranscriptionProvider("hello hi");
    const reviewer: ITranscriptReviewer = {
      review: vi.fn(async (transcript: string) => `Speaker 1: ${transcript}`),
    };

    const transcriptPath = await transcribeCommand({ audioFile: "standup.mp3" }, folders, transcription, reviewer);

    expect(transcriptPath).toBe(path.join(root, "transcripts", "standup.txt"));
    expect(transcription.calls).toEqual([path.join(root, "audio_files", "standup.mp3")]);
    expect(await fs.readFile(transcriptPath, "utf8")).toBe("Speaker 1: hello hi");
  });

  it("splits audio with the size limit in bytes", async () => {
    const split = vi.fn(async (audioPath: string) => [`${audioPath}.part1`, `${audioPath}.part2`]);
    const splitter: IAudioSplitter = { split };

    const parts = await breakCommand({ audioFile: "lecture.mp3", chunkSizeMb: 1.5 }, folders, splitter);

    const audioPath = path.join(root, "audio_files", "lecture.mp3");
    expect(parts).toEqual([`${audioPath}.part1`, `${audioPath}.part2`]);
    expect(split).toHaveBeenCalledWith(audioPath, { maxChunkBytes: 1572864 });
  });
});
