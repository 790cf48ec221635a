import { execFile } from "child_process";
import { promisify } from "util";
import * as fs from "fs/promises";
import * as path from "path";
import { AudioSplitOptions, IAudioSplitter } from "../../domain/interfaces/iaudio.splitter";
import { AudioSplitError, InputValidationError, toErrorMessage } from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args);
  return { stdout, stderr };
};

/**
 * Splits an audio file into `<name>_partNN.mp3` files of roughly equal duration
 * so that each part stays under a byte limit. Uses ffprobe for the duration and
 * ffmpeg to cut and re-encode each part.
 */
export class FfmpegAudioSplitter implements IAudioSplitter {
  // OpenAI transcription API limit: 25MB, we use 24MB for safety margin
  static readonly OPENAI_MAX_SIZE_BYTES = 24 * 1024 * 1024;
  // Output parts are re-encoded at 192kbps
  private static readonly BITRATE_BPS = 192 * 1000;

  private readonly logger = createLogger("FfmpegAudioSplitter");

  constructor(private readonly run: CommandRunner = runCommand) {}

  async split(audioPath: string, options: AudioSplitOptions): Promise<string[]> {
    let size: number;
    try {
      size = (await fs.stat(audioPath)).size;
    } catch (error) {
      throw new InputValidationError(`Audio file not found: ${audioPath}`, { cause: error });
    }

    if (size <= options.maxChunkBytes) {
      this.logger.info(`${path.basename(audioPath)} is already within ${options.maxChunkBytes} bytes`);
      return [audioPath];
    }

    await this.ensureFfmpeg();
    const durationSec = await this.readDuration(audioPath, size);

    const chunkCount = Math.ceil(size / options.maxChunkBytes);
    const chunkDurationSec = durationSec / chunkCount;
    const baseName = path.basename(audioPath, path.extname(audioPath));
    const outputDir = options.outputDir ?? path.dirname(audioPath);
    await fs.mkdir(outputDir, { recursive: true });

    this.logger.info(`Splitting ${size} bytes into ${chunkCount} parts of ~${chunkDurationSec.toFixed(1)}s each`);

    const parts: string[] = [];
    for (let i = 0; i < chunkCount; i++) {
      const startSec = i * chunkDurationSec;
      const lengthSec = i === chunkCount - 1 ? durationSec - startSec : chunkDurationSec;
      const outputPath = path.join(outputDir, `${baseName}_part${String(i + 1).padStart(2, "0")}.mp3`);

      try {
        await this.run("ffmpeg", [
          "-v", "error",
          "-i", audioPath,
          "-ss", startSec.toFixed(3),
          "-t", lengthSec.toFixed(3),
          "-vn",
          "-acodec", "libmp3lame",
          "-ab", "192k",
          "-ar", "44100",
          "-y",
          outputPath,
        ]);
      } catch (error) {
        throw new AudioSplitError(`part ${i + 1} of ${chunkCount}: ${toErrorMessage(error)}`, { cause: error });
      }

      const partBytes = (await fs.stat(outputPath)).size;
      if (partBytes > options.maxChunkBytes) {
        this.logger.warn(`Part ${i + 1} is ${partBytes} bytes, above the ${options.maxChunkBytes} byte target`);
      } else {
        this.logger.info(`Part ${i + 1}/${chunkCount}: ${path.basename(outputPath)} (${partBytes} bytes)`);
      }
      parts.push(outputPath);
    }

    return parts;
  }

  private async ensureFfmpeg(): Promise<void> {
    try {
      await this.run("ffmpeg", ["-version"]);
    } catch (error) {
      throw new AudioSplitError("ffmpeg is not installed or not available in PATH", { cause: error });
    }
  }

  private async readDuration(audioPath: string, size: number): Promise<number> {
    try {
      const { stdout } = await this.run("ffprobe", [
        "-v", "error",
        "-show_entries", "format=duration",
        "-of", "default=noprint_wrappers=1:nokey=1",
        audioPath,
      ]);
      const durationSec = parseFloat(stdout.trim());
      if (durationSec > 0) {
        return durationSec;
      }
    } catch (error) {
      this.logger.warn(`ffprobe failed: ${toErrorMessage(error)}`);
    }

    // Estimate from the file size at 192kbps
    this.logger.warn("Could not determine duration, estimating from file size");
    return (size * 8) / FfmpegAudioSplitter.BITRATE_BPS;
  }
}
