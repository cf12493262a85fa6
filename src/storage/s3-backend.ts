/**
 * S3 Object Storage Backend
 *
 * Uploads artifacts to an S3-compatible bucket and returns presigned GET URLs.
 *
 * Usage:
 *   const storage = new S3ObjectStorage({ bucket: 'artifacts', region: 'us-east-1' });
 *   const { url, expiresAt } = await storage.put(bytes, 'session/report.pdf', 'application/pdf');
 */

import {
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import {
  DEFAULT_SIGNED_URL_TTL_SECONDS,
  type HealthCheckResult,
  type ObjectStorage,
  type S3StorageConfig,
  type SignedObject,
} from './types';

export class S3ObjectStorage implements ObjectStorage {
  readonly type = 's3' as const;
  readonly name: string;

  private readonly client: S3Client;
  private readonly config: S3StorageConfig;
  private readonly ttlSeconds: number;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.config = config;
    this.ttlSeconds = config.signedUrlTtlSeconds ?? DEFAULT_SIGNED_URL_TTL_SECONDS;
    this.name = `S3: ${config.bucket}`;
    this.client = client ?? new S3Client({
      region: config.region,
      ...(config.endpoint ? { endpoint: config.endpoint, forcePathStyle: true } : {}),
    });
  }

  private fullKey(key: string): string {
    return this.config.prefix ? `${this.config.prefix}/${key}` : key;
  }

  async put(data: Buffer, key: string, contentType: string): Promise<SignedObject> {
    const Key = this.fullKey(key);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key,
        Body: data,
        ContentType: contentType,
      })
    );

    const issuedAt = Date.now();
    const url = await getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.config.bucket, Key }),
      { expiresIn: this.ttlSeconds }
    );

    return { url, expiresAt: new Date(issuedAt + this.ttlSeconds * 1000) };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.config.bucket }));
      return { healthy: true };
    } catch (error) {
      return {
        healthy: false,
        message: `S3 error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}

/**
 * Create an S3 backend
 */
export function createS3Storage(config: S3StorageConfig): S3ObjectStorage {
  return new S3ObjectStorage(config);
}
