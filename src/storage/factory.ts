/**
 * Storage Backend Factory
 *
 * Creates the configured object storage backend.
 */

import type { ObjectStorage, ObjectStorageType, StorageConfig } from './types';
import { createLocalStorage } from './local-backend';
import { createS3Storage } from './s3-backend';

type StorageFactory<K extends ObjectStorageType> = (
  config: Extract<StorageConfig, { kind: K }>
) => ObjectStorage;

const factories: { [K in ObjectStorageType]: StorageFactory<K> } = {
  local: (config) => createLocalStorage(config),
  s3: (config) => createS3Storage(config),
};

/**
 * Create the storage backend described by config
 */
export function createObjectStorage(config: StorageConfig): ObjectStorage {
  switch (config.kind) {
    case 'local':
      return factories.local(config);
    case 's3':
      return factories.s3(config);
  }
}
