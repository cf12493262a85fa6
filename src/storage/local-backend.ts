/**
 * Local Filesystem Storage Backend
 *
 * Stores artifacts in a directory and hands out file:// URLs. Expiry is
 * advisory: the URL carries the same lifetime the S3 backend would give it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import {
  DEFAULT_SIGNED_URL_TTL_SECONDS,
  type HealthCheckResult,
  type LocalStorageConfig,
  type ObjectStorage,
  type SignedObject,
} from './types';

export class LocalObjectStorage implements ObjectStorage {
  readonly type = 'local' as const;
  readonly name: string;

  private readonly baseDir: string;
  private readonly ttlSeconds: number;

  constructor(config: LocalStorageConfig) {
    this.baseDir = path.resolve(config.directory);
    this.ttlSeconds = config.signedUrlTtlSeconds ?? DEFAULT_SIGNED_URL_TTL_SECONDS;
    this.name = `Local: ${this.baseDir}`;
  }

  /**
   * Get the on-disk path for a key, refusing keys that leave the base directory
   */
  private objectPath(key: string): string {
    const target = path.resolve(this.baseDir, key);
    if (target !== this.baseDir && !target.startsWith(this.baseDir + path.sep)) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return target;
  }

  async put(data: Buffer, key: string, _contentType: string): Promise<SignedObject> {
    const target = this.objectPath(key);
    await fs.mkdir(path.dirname(target), { recursive: true });

    // Write to temp file first, then rename (atomic)
    const tempPath = `${target}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, target);

    return {
      url: pathToFileURL(target).href,
      expiresAt: new Date(Date.now() + this.ttlSeconds * 1000),
    };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.access(this.baseDir, fs.constants.W_OK);
      return { healthy: true };
    } catch (error) {
      return {
        healthy: false,
        message: `Local storage error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}

/**
 * Create a local backend
 */
export function createLocalStorage(config: LocalStorageConfig): LocalObjectStorage {
  return new LocalObjectStorage(config);
}
