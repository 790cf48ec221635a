import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocxTemplateFiller } from "./docx.template.filler";
import { buildDocx, readDocxParagraphs } from "../../testing/docx.fixtures";
import { InputValidationError, TemplateFormatError, TemplateNotFoundError } from "../../domain/errors/app.errors";

describe("DocxTemplateFiller", () => {
  let dir: string;
  let outputDir: string;
  const filler = new DocxTemplateFiller();

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "filler-test-"));
    outputDir = path.join(dir, "out");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeTemplate(name: string, paragraphs: string[]): Promise<string> {
    const templatePath = path.join(dir, name);
    await fs.writeFile(templatePath, buildDocx(paragraphs));
    return templatePath;
  }

  it("replaces the placeholder and keeps the rest of the template", async () => {
    const templatePath = await writeTemplate("default.docx", [
      "Audio Transcription Report",
      "{{summary}}",
      "Prepared automatically",
    ]);

    const reportPath = await filler.fill(templatePath, "The team agreed to ship on Friday.", {
      outputDir,
      fileName: "intro_report.docx",
    });

    expect(reportPath).toBe(path.join(outputDir, "intro_report.docx"));
    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual([
      "Audio Transcription Report",
      "The team agreed to ship on Friday.",
      "Prepared automatically",
    ]);
  });

  it("turns line breaks in the text into Word line breaks", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);

    const reportPath = await filler.fill(templatePath, "Line one\nLine two", { outputDir, fileName: "out.docx" });

    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual(["Line one\nLine two"]);
  });

  it("leaves other tags untouched", async () => {
    const templatePath = await writeTemplate("default.docx", ["Client: {{client}}", "{{summary}}"]);

    const reportPath = await filler.fill(templatePath, "Done.", { outputDir, fileName: "out.docx" });

    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual(["Client: {{client}}", "Done."]);
  });

  it("never modifies the template", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);
    const before = await fs.readFile(templatePath);

    await filler.fill(templatePath, "Done.", { outputDir, fileName: "out.docx" });

    expect((await fs.readFile(templatePath)).equals(before)).toBe(true);
  });

  it("generates a file name when none is given", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);

    const reportPath = await filler.fill(templatePath, "Done.", { outputDir });

    expect(path.dirname(reportPath)).toBe(outputDir);
    expect(path.basename(reportPath)).toMatch(/^report-[0-9a-f-]{36}\.docx$/);
  });

  it("fails with TemplateFormatError and writes nothing when the placeholder is missing", async () => {
    const templatePath = await writeTemplate("plain.docx", ["No marker in here"]);

    await expect(filler.fill(templatePath, "Done.", { outputDir, fileName: "out.docx" })).rejects.toBeInstanceOf(
      TemplateFormatError
    );
    await expect(fs.readdir(outputDir)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("rejects a template with the placeholder twice", async () => {
    const templatePath = await writeTemplate("twice.docx", ["{{summary}}", "{{summary}}"]);

    await expect(filler.fill(templatePath, "Done.", { outputDir })).rejects.toThrow(
      "contains the placeholder {{summary}} 2 times, expected once"
    );
  });

  it("fails with TemplateNotFoundError for a missing template", async () => {
    await expect(
      filler.fill(path.join(dir, "missing.docx"), "Done.", { outputDir })
    ).rejects.toBeInstanceOf(TemplateNotFoundError);
  });

  it("fails with TemplateFormatError for a file that is not a docx", async () => {
    const templatePath = path.join(dir, "broken.docx");
    await fs.writeFile(templatePath, "definitely not a zip archive");

    await expect(filler.fill(templatePath, "Done.", { outputDir })).rejects.toBeInstanceOf(TemplateFormatError);
  });

  it("refuses to overwrite an existing report", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);
    await filler.fill(templatePath, "First.", { outputDir, fileName: "out.docx" });

    await expect(filler.fill(templatePath, "Second.", { outputDir, fileName: "out.docx" })).rejects.toBeInstanceOf(
      InputValidationError
    );
    expect(readDocxParagraphs(await fs.readFile(path.join(outputDir, "out.docx")))).toEqual(["First."]);
  });

  it("rejects file names with directories", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);

    await expect(
      filler.fill(templatePath, "Done.", { outputDir, fileName: "../escape.docx" })
    ).rejects.toBeInstanceOf(InputValidationError);
  });

  it("replaces an earlier report when asked to", async () => {
    const templatePath = await writeTemplate("default.docx", ["{{summary}}"]);
    await filler.fill(templatePath, "First draft.", { outputDir, fileName: "intro_report.docx" });

    const reportPath = await filler.fill(templatePath, "Second draft.", {
      outputDir,
      fileName: "intro_report.docx",
      overwrite: true,
    });

    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual(["Second draft."]);
    expect(await fs.readdir(outputDir)).toEqual(["intro_report.docx"]);
  });

  it("uses a configurable placeholder name", async () => {
    const custom = new DocxTemplateFiller("report_body");
    const templatePath = await writeTemplate("custom.docx", ["{{report_body}}"]);

    const reportPath = await custom.fill(templatePath, "Body text", { outputDir, fileName: "out.docx" });

    expect(readDocxParagraphs(await fs.readFile(reportPath))).toEqual(["Body text"]);
  });

  describe("extractText", () => {
    it("returns the non-empty paragraphs without the placeholder", async () => {
      const templatePath = await writeTemplate("guide.docx", [
        "Sections: Introduction, Decisions & Risks",
        "",
        "{{summary}}",
        "Keep it under one page",
      ]);

      await expect(filler.extractText(templatePath)).resolves.toBe(
        "Sections: Introduction, Decisions & Risks\nKeep it under one page"
      );
    });

    it("fails with TemplateNotFoundError for a missing template", async () => {
      await expect(filler.extractText(path.join(dir, "missing.docx"))).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
    });
  });
});
