import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DOCX_CONTENT_TYPE, LocatorResolver } from "./locator.resolver";
import { InMemoryObjectStorage } from "../../testing/fakes";
import { TempWorkspace } from "../../infrastructure/fs/temp.workspace";
import { InputValidationError, LocatorFormatError, LocatorNotFoundError } from "../../domain/errors/app.errors";

describe("LocatorResolver", () => {
  let baseDir: string;
  let workspace: TempWorkspace;
  let storage: InMemoryObjectStorage;
  let resolver: LocatorResolver;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "resolver-test-"));
    workspace = await TempWorkspace.create(baseDir);
    storage = new InMemoryObjectStorage();
    resolver = new LocatorResolver(storage, { bucket: "team-audio", downloadUrlTtlSeconds: 600 });
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  describe("resolveInput", () => {
    it("downloads the object into the workspace", async () => {
      storage.seed("team-audio", "meetings/intro.mp3", "audio-bytes");

      const localPath = await resolver.resolveInput("s3://team-audio/meetings/intro.mp3", workspace);

      expect(path.dirname(localPath)).toBe(workspace.dir);
      expect(path.basename(localPath)).toMatch(/^[0-9a-f]{8}-intro\.mp3$/);
      expect(await fs.readFile(localPath, "utf8")).toBe("audio-bytes");
    });

    it("rejects a malformed locator without reading storage or writing files", async () => {
      await expect(resolver.resolveInput("ftp://team-audio/intro.mp3", workspace)).rejects.toBeInstanceOf(
        LocatorFormatError
      );
      expect(storage.reads).toEqual([]);
      expect(await fs.readdir(workspace.dir)).toEqual([]);
    });

    it("only serves the configured bucket", async () => {
      storage.seed("other-bucket", "intro.mp3", "audio-bytes");

      await expect(resolver.resolveInput("s3://other-bucket/intro.mp3", workspace)).rejects.toThrow(
        'Invalid locator "s3://other-bucket/intro.mp3": bucket "other-bucket" is not served by this service'
      );
      expect(storage.reads).toEqual([]);
    });

    it("reports objects that do not exist", async () => {
      await expect(resolver.resolveInput("s3://team-audio/missing.mp3", workspace)).rejects.toBeInstanceOf(
        LocatorNotFoundError
      );
      expect(await fs.readdir(workspace.dir)).toEqual([]);
    });

    it("keeps inputs with the same file name apart", async () => {
      storage.seed("team-audio", "a/clip.mp3", "first");
      storage.seed("team-audio", "b/clip.mp3", "second");

      const first = await resolver.resolveInput("s3://team-audio/a/clip.mp3", workspace);
      const second = await resolver.resolveInput("s3://team-audio/b/clip.mp3", workspace);

      expect(first).not.toBe(second);
      expect(await fs.readFile(first, "utf8")).toBe("first");
      expect(await fs.readFile(second, "utf8")).toBe("second");
    });
  });

  describe("publishOutput", () => {
    it("uploads under the caller's prefix and returns a download URL", async () => {
      const localPath = workspace.resolve("intro_report.docx");
      await fs.writeFile(localPath, "docx-bytes");

      const published = await resolver.publishOutput(localPath, "reports", { userId: "user-1" });

      expect(published.locator).toMatch(/^s3:\/\/team-audio\/reports\/user-1\/[0-9a-f-]{36}-intro_report\.docx$/);
      const key = published.locator.slice("s3://team-audio/".length);
      expect(published.downloadUrl).toBe(`https://storage.test/team-audio/${key}?expires=600`);
      expect(storage.writes).toEqual([
        {
          key,
          options: {
            contentType: DOCX_CONTENT_TYPE,
            metadata: { userId: "user-1", originalFilename: "intro_report.docx" },
            signal: undefined,
          },
        },
      ]);
    });

    it("never overwrites an earlier report", async () => {
      const localPath = workspace.resolve("intro_report.docx");
      await fs.writeFile(localPath, "docx-bytes");

      const first = await resolver.publishOutput(localPath, "reports", { userId: "user-1" });
      const second = await resolver.publishOutput(localPath, "reports", { userId: "user-1" });

      expect(first.locator).not.toBe(second.locator);
      expect(storage.writes).toHaveLength(2);
    });

    it("sanitizes key segments", async () => {
      const localPath = workspace.resolve("report.docx");
      await fs.writeFile(localPath, "docx-bytes");

      const published = await resolver.publishOutput(localPath, "/reports/", {
        userId: "../user 2",
        fileName: "Q3 review.docx",
      });

      expect(published.locator).toMatch(/^s3:\/\/team-audio\/reports\/__user_2\/[0-9a-f-]{36}-Q3_review\.docx$/);
    });

    it("returns a null URL when presigning fails", async () => {
      const localPath = workspace.resolve("report.docx");
      await fs.writeFile(localPath, "docx-bytes");
      vi.spyOn(storage, "getDownloadUrl").mockRejectedValue(new Error("no credentials"));

      const published = await resolver.publishOutput(localPath, "reports", { userId: "user-1" });

      expect(published.downloadUrl).toBeNull();
      expect(published.locator).toMatch(/^s3:\/\/team-audio\/reports\/user-1\//);
    });

    it("fails when the local report is missing", async () => {
      await expect(
        resolver.publishOutput(workspace.resolve("missing.docx"), "reports", { userId: "user-1" })
      ).rejects.toBeInstanceOf(InputValidationError);
      expect(storage.writes).toEqual([]);
    });
  });
});
