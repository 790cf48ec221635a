export interface AudioSplitOptions {
  maxChunkBytes: number;
  // Defaults to the directory of the source file
  outputDir?: string;
}

export interface IAudioSplitter {
  /**
   * Returns the paths of the parts, or the source path itself when it is already under the limit.
   */
  split(audioPath: string, options: AudioSplitOptions): Promise<string[]>;
}
