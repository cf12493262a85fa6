/**
 * Storage Module
 *
 * Object storage for execution artifacts.
 * Supports the local filesystem and S3-compatible services.
 */

// Types
export * from './types';

// Backends
export { LocalObjectStorage, createLocalStorage } from './local-backend';
export { S3ObjectStorage, createS3Storage } from './s3-backend';

// Factory
export { createObjectStorage } from './factory';
