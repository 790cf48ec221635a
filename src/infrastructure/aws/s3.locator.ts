import { LocatorFormatError } from "../../domain/errors/app.errors";
import { ObjectLocation } from "../../domain/interfaces/iobject.storage";

// <bucket>.s3.amazonaws.com, <bucket>.s3.<region>.amazonaws.com, <bucket>.s3-<region>.amazonaws.com
const VIRTUAL_HOSTED_PATTERN = /^(?<bucket>[a-z0-9][a-z0-9.-]{1,61}[a-z0-9])\.s3(?:[.-][a-z0-9-]+)?\.amazonaws\.com$/;
const BUCKET_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

function validateKey(locator: string, key: string): string {
  if (!key) {
    throw new LocatorFormatError(locator, "an object key is required after the bucket name");
  }
  if (key.endsWith("/")) {
    throw new LocatorFormatError(locator, "the key must name an object, not a folder");
  }
  return key;
}

/**
 * Parses a storage locator into bucket and key.
 * Accepts s3://bucket/key and virtual-hosted https://bucket.s3[.region].amazonaws.com/key.
 */
export function parseLocator(locator: string): ObjectLocation {
  const trimmed = locator.trim();

  if (trimmed.startsWith("s3://")) {
    const withoutProtocol = trimmed.slice(5); // Remove "s3://"
    const firstSlash = withoutProtocol.indexOf("/");
    if (firstSlash === -1) {
      throw new LocatorFormatError(locator, "an object key is required after the bucket name");
    }

    const bucket = withoutProtocol.slice(0, firstSlash);
    if (!BUCKET_PATTERN.test(bucket)) {
      throw new LocatorFormatError(locator, `"${bucket}" is not a valid bucket name`);
    }
    return { bucket, key: validateKey(locator, withoutProtocol.slice(firstSlash + 1)) };
  }

  if (trimmed.startsWith("https://")) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      throw new LocatorFormatError(locator, "not a valid URL");
    }

    const match = VIRTUAL_HOSTED_PATTERN.exec(url.hostname);
    if (!match?.groups) {
      throw new LocatorFormatError(locator, "the host is not an S3 bucket endpoint");
    }

    let key: string;
    try {
      key = decodeURIComponent(url.pathname.replace(/^\//, ""));
    } catch {
      throw new LocatorFormatError(locator, "the object key is not correctly encoded");
    }
    return { bucket: match.groups.bucket, key: validateKey(locator, key) };
  }

  throw new LocatorFormatError(locator, 'expected "s3://<bucket>/<key>" or an https S3 object URL');
}

export function formatLocator(location: ObjectLocation): string {
  return `s3://${location.bucket}/${location.key}`;
}
