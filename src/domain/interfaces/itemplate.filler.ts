export interface FillOptions {
  outputDir: string;
  fileName?: string;
  // Replace an existing file of the same name instead of failing
  overwrite?: boolean;
}

export interface ITemplateFiller {
  fill(templatePath: string, generatedText: string, options: FillOptions): Promise<string>;
  extractText(templatePath: string): Promise<string>;
}
