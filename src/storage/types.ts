/**
 * Object Storage Types
 *
 * Defines the interface for pluggable artifact storage backends.
 * Supports local filesystem and S3-compatible services.
 */

// =============================================================================
// Storage Backend Types
// =============================================================================

/**
 * Supported storage backend types
 */
export type ObjectStorageType = 'local' | 's3';

/**
 * Where a stored object can be fetched, and until when
 */
export interface SignedObject {
  url: string;
  expiresAt: Date;
}

/**
 * Result of a health check
 */
export interface HealthCheckResult {
  healthy: boolean;
  message?: string;
}

/**
 * Object storage capability consumed by the artifact processor
 */
export interface ObjectStorage {
  /** The backend type */
  readonly type: ObjectStorageType;

  /** Human-readable name */
  readonly name: string;

  /**
   * Store bytes under key and return a time-limited URL for them
   */
  put(data: Buffer, key: string, contentType: string): Promise<SignedObject>;

  /**
   * Check if the backend is accessible
   */
  healthCheck(): Promise<HealthCheckResult>;
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface S3StorageConfig {
  bucket: string;
  region: string;
  /** Endpoint URL for S3-compatible services (MinIO, R2) */
  endpoint?: string;
  /** Key prefix for all objects */
  prefix?: string;
  /** Lifetime of signed URLs */
  signedUrlTtlSeconds?: number;
}

export interface LocalStorageConfig {
  directory: string;
  signedUrlTtlSeconds?: number;
}

export type StorageConfig =
  | ({ kind: 's3' } & S3StorageConfig)
  | ({ kind: 'local' } & LocalStorageConfig);

export const DEFAULT_SIGNED_URL_TTL_SECONDS = 3600;
