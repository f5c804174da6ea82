/**
 * Object store access for the remote adapter
 */

import {
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3ServiceException,
  type S3Client,
} from "@aws-sdk/client-s3";

/**
 * Minimal object store surface used by the remote adapter.
 * Implementations throw on transport or auth failures.
 */
export interface ObjectStore {
  /**
   * Human-readable address of an object, used in errors and logs
   */
  urlFor(key: string): string;

  /**
   * Fetch an object as UTF-8 text
   * @returns Object body, or null if the object does not exist
   */
  getObject(key: string): Promise<string | null>;

  /**
   * Upload a full replacement for an object
   */
  putObject(key: string, body: string): Promise<void>;
}

/**
 * True if an S3 error means "the object is not there".
 * Other 404s, such as NoSuchBucket, are read failures.
 */
export function isMissingObjectError(err: unknown): boolean {
  if (err instanceof NoSuchKey) {
    return true;
  }
  // S3-compatible stores sometimes answer a bare NotFound instead of NoSuchKey
  return err instanceof S3ServiceException && err.name === "NotFound";
}

/**
 * ObjectStore over an S3 (or S3-compatible) bucket
 */
export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  urlFor(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }

  async getObject(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
      if (!response.Body) {
        return null;
      }
      return await response.Body.transformToString("utf-8");
    } catch (err) {
      if (isMissingObjectError(err)) {
        return null;
      }
      throw err;
    }
  }

  async putObject(key: string, body: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: "application/json; charset=utf-8",
      })
    );
  }
}
