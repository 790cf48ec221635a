export interface ObjectLocation {
  bucket: string;
  key: string;
}

export interface PutObjectOptions {
  contentType?: string;
  metadata?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Minimal object storage capability (S3 or compatible).
 * getObject rejects with LocatorNotFoundError when the key does not exist.
 * putObject rejects instead of replacing an existing object.
 */
export interface IObjectStorage {
  getObject(location: ObjectLocation, options?: { signal?: AbortSignal }): Promise<Uint8Array>;
  putObject(location: ObjectLocation, body: Uint8Array, options?: PutObjectOptions): Promise<void>;
  getDownloadUrl(location: ObjectLocation, expiresInSeconds: number): Promise<string>;
}
