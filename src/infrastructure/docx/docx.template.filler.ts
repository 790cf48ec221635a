import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import PizZip from "pizzip";
import Docxtemplater from "docxtemplater";
import { FillOptions, ITemplateFiller } from "../../domain/interfaces/itemplate.filler";
import {
  InputValidationError,
  TemplateFormatError,
  TemplateNotFoundError,
  toErrorMessage,
} from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";

const MAIN_DOCUMENT_PART = "word/document.xml";
const DELIMITERS = { start: "{{", end: "}}" };

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&apos;": "'",
};

function decodeXml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Fills Word templates through docxtemplater. The template must contain the
 * placeholder tag (e.g. {{summary}}) exactly once; any other {{tag}} is kept verbatim.
 */
export class DocxTemplateFiller implements ITemplateFiller {
  private readonly logger = createLogger("DocxTemplateFiller");
  private readonly token: string;

  constructor(private readonly placeholder: string = "summary") {
    this.token = `${DELIMITERS.start}${placeholder}${DELIMITERS.end}`;
  }

  async fill(templatePath: string, generatedText: string, options: FillOptions): Promise<string> {
    const zip = await this.loadZip(templatePath);
    const doc = this.compile(zip, templatePath);

    const occurrences = countOccurrences(doc.getFullText(), this.token);
    if (occurrences !== 1) {
      throw new TemplateFormatError(
        occurrences === 0
          ? `Template ${path.basename(templatePath)} does not contain the placeholder ${this.token}`
          : `Template ${path.basename(templatePath)} contains the placeholder ${this.token} ${occurrences} times, expected once`
      );
    }

    let output: Buffer;
    try {
      doc.render({ [this.placeholder]: generatedText });
      output = doc.getZip().generate({ type: "nodebuffer", compression: "DEFLATE" });
    } catch (error) {
      throw new TemplateFormatError(`Failed to render template: ${toErrorMessage(error)}`, { cause: error });
    }

    const reportPath = path.join(options.outputDir, this.resolveFileName(options.fileName));
    await fs.mkdir(options.outputDir, { recursive: true });

    if (options.overwrite) {
      await this.replaceFile(reportPath, output);
    } else {
      try {
        // "wx": never replace an existing report
        await fs.writeFile(reportPath, output, { flag: "wx" });
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "EEXIST") {
          throw new InputValidationError(`Report already exists: ${reportPath}`, { cause: error });
        }
        await fs.rm(reportPath, { force: true });
        throw error;
      }
    }

    this.logger.info(`Report written: ${reportPath}`, { bytes: output.length });
    return reportPath;
  }

  /**
   * Returns the template's non-empty paragraphs, one per line, without the placeholder.
   */
  async extractText(templatePath: string): Promise<string> {
    const zip = await this.loadZip(templatePath);
    const xml = zip.file(MAIN_DOCUMENT_PART)?.asText();
    if (!xml) {
      throw new TemplateFormatError(`Template ${path.basename(templatePath)} has no ${MAIN_DOCUMENT_PART}`);
    }

    const paragraphs = xml
      .split("</w:p>")
      .map((chunk) => decodeXml(chunk.replace(/<w:tab\/>/g, "\t").replace(/<[^>]+>/g, "")))
      .map((text) => text.split(this.token).join("").trim())
      .filter((text) => text.length > 0);

    this.logger.info(`Extracted ${paragraphs.length} paragraphs from ${path.basename(templatePath)}`);
    return paragraphs.join("\n");
  }

  // The previous report stays intact until the new one is complete
  private async replaceFile(reportPath: string, output: Buffer): Promise<void> {
    const partialPath = `${reportPath}.${randomUUID().slice(0, 8)}.partial`;
    try {
      await fs.writeFile(partialPath, output, { flag: "wx" });
      await fs.rename(partialPath, reportPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true });
      throw error;
    }
  }

  private async loadZip(templatePath: string): Promise<PizZip> {
    let content: Buffer;
    try {
      content = await fs.readFile(templatePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR")) {
        throw new TemplateNotFoundError(templatePath, { cause: error });
      }
      throw error;
    }

    try {
      return new PizZip(content);
    } catch (error) {
      throw new TemplateFormatError(
        `Template ${path.basename(templatePath)} is not a valid .docx file: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private compile(zip: PizZip, templatePath: string): Docxtemplater {
    try {
      return new Docxtemplater(zip, {
        delimiters: DELIMITERS,
        paragraphLoop: true,
        linebreaks: true,
        // Leave tags other than the placeholder untouched
        nullGetter: (part) => (part.module ? "" : `${DELIMITERS.start}${part.value}${DELIMITERS.end}`),
      });
    } catch (error) {
      throw new TemplateFormatError(
        `Template ${path.basename(templatePath)} could not be parsed: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private resolveFileName(fileName?: string): string {
    if (!fileName) {
      return `report-${randomUUID()}.docx`;
    }
    if (path.basename(fileName) !== fileName || fileName.startsWith(".")) {
      throw new InputValidationError(`Invalid report file name: ${fileName}`);
    }
    return fileName.toLowerCase().endsWith(".docx") ? fileName : `${fileName}.docx`;
  }
}
