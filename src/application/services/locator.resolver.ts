import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import { IObjectStorage, ObjectLocation } from "../../domain/interfaces/iobject.storage";
import { PublishedReport } from "../../domain/entities/report";
import { InputValidationError, LocatorFormatError, toErrorMessage } from "../../domain/errors/app.errors";
import { formatLocator, parseLocator } from "../../infrastructure/aws/s3.locator";
import { LocalWorkspace } from "../../infrastructure/fs/temp.workspace";
import { createLogger } from "../../infrastructure/logging/logger";

export const DOCX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface LocatorResolverOptions {
  bucket: string;
  downloadUrlTtlSeconds: number;
}

export interface PublishOptions {
  userId: string;
  fileName?: string;
  signal?: AbortSignal;
}

function toKeySegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "_");
}

/**
 * Moves files between remote storage and the local, request-scoped workspace.
 */
export class LocatorResolver {
  private readonly logger = createLogger("LocatorResolver");

  constructor(
    private readonly storage: IObjectStorage,
    private readonly options: LocatorResolverOptions
  ) {}

  /**
   * Validates the locator's scheme and bucket without touching storage or disk.
   */
  parse(locator: string): ObjectLocation {
    const location = parseLocator(locator);
    if (location.bucket !== this.options.bucket) {
      throw new LocatorFormatError(locator, `bucket "${location.bucket}" is not served by this service`);
    }
    return location;
  }

  async resolveInput(
    locator: string,
    workspace: LocalWorkspace,
    options?: { signal?: AbortSignal }
  ): Promise<string> {
    const location = this.parse(locator);
    const bytes = await this.storage.getObject(location, { signal: options?.signal });

    // Prefix keeps two inputs with the same file name apart
    const localPath = workspace.resolve(`${randomUUID().slice(0, 8)}-${toKeySegment(path.posix.basename(location.key))}`);
    await fs.writeFile(localPath, bytes, { flag: "wx" });

    this.logger.info(`Resolved ${formatLocator(location)} → ${localPath}`, { bytes: bytes.length });
    return localPath;
  }

  /**
   * Uploads a local file under <prefix>/<userId>/<uuid>-<fileName>. Every call creates a new object.
   */
  async publishOutput(localPath: string, destinationPrefix: string, options: PublishOptions): Promise<PublishedReport> {
    let body: Buffer;
    try {
      body = await fs.readFile(localPath);
    } catch (error) {
      throw new InputValidationError(`Report file not found: ${localPath}`, { cause: error });
    }

    const fileName = toKeySegment(options.fileName ?? path.basename(localPath));
    const segments = [
      destinationPrefix.replace(/^\/+|\/+$/g, ""),
      toKeySegment(options.userId),
      `${randomUUID()}-${fileName}`,
    ].filter((segment) => segment.length > 0);

    const location: ObjectLocation = { bucket: this.options.bucket, key: segments.join("/") };
    await this.storage.putObject(location, body, {
      contentType: DOCX_CONTENT_TYPE,
      metadata: { userId: options.userId, originalFilename: fileName },
      signal: options.signal,
    });

    let downloadUrl: string | null = null;
    try {
      downloadUrl = await this.storage.getDownloadUrl(location, this.options.downloadUrlTtlSeconds);
    } catch (error) {
      this.logger.warn(`Could not presign ${formatLocator(location)}: ${toErrorMessage(error)}`);
    }

    const locator = formatLocator(location);
    this.logger.info(`Published ${localPath} → ${locator}`);
    return { locator, downloadUrl };
  }
}
