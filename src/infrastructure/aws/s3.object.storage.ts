import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  NoSuchKey,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { IObjectStorage, ObjectLocation, PutObjectOptions } from "../../domain/interfaces/iobject.storage";
import {
  LocatorNotFoundError,
  OperationCancelledError,
  StorageError,
  toErrorMessage,
} from "../../domain/errors/app.errors";
import { createLogger } from "../logging/logger";
import { formatLocator } from "./s3.locator";

/**
 * Sanitizes metadata values to remove invalid characters for HTTP headers.
 * Only alphanumeric characters, spaces, hyphens, underscores, periods and commas are kept.
 */
export function sanitizeMetadataValue(value: string): string {
  if (!value) return "";

  let str = value
    .replace(/[^a-zA-Z0-9\s\-_.,]/g, "_")
    .replace(/\s+/g, " ")
    .trim();

  // AWS metadata value limit (2KB)
  if (str.length > 2000) {
    str = str.substring(0, 2000);
  }

  return str;
}

/**
 * Configuration for S3ObjectStorage.
 */
export interface S3ObjectStorageConfig {
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  endpoint?: string; // For S3-compatible services like MinIO
  forcePathStyle?: boolean; // Use path-style addressing (required for some S3-compatible services)
}

export class S3ObjectStorage implements IObjectStorage {
  private readonly s3Client: S3Client;
  private readonly logger = createLogger("S3ObjectStorage");

  constructor(config: S3ObjectStorageConfig = {}) {
    const region = config.region || "us-east-1";
    this.logger.info(`Initializing with region: ${region}`);

    this.s3Client = new S3Client({
      region,
      credentials: config.credentials,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle || false,
    });
  }

  async getObject(location: ObjectLocation, options?: { signal?: AbortSignal }): Promise<Uint8Array> {
    const uri = formatLocator(location);

    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
        { abortSignal: options?.signal }
      );

      if (!response.Body) {
        throw new StorageError(`No body returned from S3 for ${uri}`);
      }

      const bytes = await response.Body.transformToByteArray();
      this.logger.info(`Downloaded ${uri}`, { bytes: bytes.length });
      return bytes;
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      if (
        error instanceof NoSuchKey ||
        (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404)
      ) {
        throw new LocatorNotFoundError(uri, { cause: error });
      }
      if (options?.signal?.aborted) {
        throw new OperationCancelledError(`Download of ${uri} was cancelled`, { cause: error });
      }
      throw new StorageError(`Failed to download ${uri}: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  async putObject(location: ObjectLocation, body: Uint8Array, options?: PutObjectOptions): Promise<void> {
    const uri = formatLocator(location);
    const metadata = options?.metadata
      ? Object.fromEntries(
          Object.entries(options.metadata).map(([key, value]) => [key, sanitizeMetadataValue(value)])
        )
      : undefined;

    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: location.bucket,
          Key: location.key,
          Body: body,
          ContentType: options?.contentType,
          Metadata: metadata,
          // Conditional write: fail rather than replace an existing object
          IfNoneMatch: "*",
        }),
        { abortSignal: options?.signal }
      );
      this.logger.info(`Uploaded ${uri}`, { bytes: body.length });
    } catch (error) {
      if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 412) {
        throw new StorageError(`Object already exists: ${uri}`, { cause: error });
      }
      if (options?.signal?.aborted) {
        throw new OperationCancelledError(`Upload of ${uri} was cancelled`, { cause: error });
      }
      throw new StorageError(`Failed to upload ${uri}: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  async getDownloadUrl(location: ObjectLocation, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(
      this.s3Client,
      new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
      { expiresIn: expiresInSeconds }
    );
  }
}
