/**
 * Object storage for alarm metadata, thumbnails and videos.
 *
 * Keys are partitioned by day folder (see utils/key-scheme). Writes overwrite:
 * the pipeline relies on last-writer-wins and deterministic keys rather than
 * any locking.
 */

import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  StorageClass,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { StorageError } from '../utils/errors';
import { Logger, describeError } from '../utils/logger';

export interface SignedUrlOptions {
  expiresInSeconds: number;
  downloadFileName?: string;
}

export interface ObjectStore {
  putJson(key: string, json: string): Promise<void>;
  putBinary(key: string, data: Uint8Array, contentType: string): Promise<void>;
  // Resolves undefined when the key does not exist
  getText(key: string): Promise<string | undefined>;
  exists(key: string): Promise<boolean>;
  // All keys under a prefix, in ascending key order
  listKeys(prefix: string): Promise<string[]>;
  signGetUrl(key: string, options: SignedUrlOptions): Promise<string>;
  checkAccess(): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.name === 'NoSuchKey' || error.name === 'NotFound' || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly logger: Logger
  ) {}

  async putJson(key: string, json: string): Promise<void> {
    await this.put(key, json, 'application/json');
  }

  async putBinary(key: string, data: Uint8Array, contentType: string): Promise<void> {
    await this.put(key, data, contentType);
  }

  private async put(key: string, body: string | Uint8Array, contentType: string): Promise<void> {
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
      StorageClass: StorageClass.STANDARD_IA,
    });

    try {
      await this.client.send(command);
      this.logger.info('Wrote object to S3', { bucket: this.bucket, key, size: body.length });
    } catch (error) {
      this.logger.error('Failed to write object to S3', { bucket: this.bucket, key, ...describeError(error) });
      throw new StorageError(`Failed to write ${key}`, { cause: error });
    }
  }

  async getText(key: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return undefined;
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new StorageError(`Failed to read ${key}`, { cause: error });
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const response = await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      this.logger.debug('Object confirmed in S3', { key, size: response.ContentLength });
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageError(`Failed to check ${key}`, { cause: error });
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined = undefined;

    try {
      do {
        const response: ListObjectsV2CommandOutput = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          })
        );

        for (const object of response.Contents ?? []) {
          if (object.Key) {
            keys.push(object.Key);
          }
        }

        continuationToken = response.NextContinuationToken;
      } while (continuationToken);
    } catch (error) {
      throw new StorageError(`Failed to list ${prefix}`, { cause: error });
    }

    return keys;
  }

  async signGetUrl(key: string, options: SignedUrlOptions): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: key,
      ResponseContentDisposition: options.downloadFileName
        ? `attachment; filename="${options.downloadFileName}"`
        : undefined,
    });

    try {
      return await getSignedUrl(this.client, command, { expiresIn: options.expiresInSeconds });
    } catch (error) {
      throw new StorageError(`Failed to sign a URL for ${key}`, { cause: error });
    }
  }

  async checkAccess(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      throw new StorageError(`Bucket ${this.bucket} is not reachable`, { cause: error });
    }
  }
}
