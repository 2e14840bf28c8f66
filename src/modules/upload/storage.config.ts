/**
 * Storage configuration
 * Avatars go either to Cloudflare Images or to the local upload directory
 */

import { storageConfig } from '../../connections/config/app.config';
import { logger } from '../../utils/logging';

export const STORAGE_TYPES = ['cloudflare', 'local'] as const;

export type StorageType = (typeof STORAGE_TYPES)[number];

export interface ResolvedStorageConfig {
  type: StorageType;
  uploadDir: string;
  cloudflare: { accountId: string; apiToken: string } | null;
}

const isStorageType = (value: string): value is StorageType =>
  STORAGE_TYPES.some(type => type === value);

export const getStorageConfig = (settings: typeof storageConfig = storageConfig): ResolvedStorageConfig => {
  let type: StorageType = 'local';

  if (isStorageType(settings.type)) {
    type = settings.type;
  } else {
    logger.warn(`Invalid STORAGE_TYPE: ${settings.type}, defaulting to 'local'`);
  }

  const hasCloudflareConfig = Boolean(settings.cloudflareAccountId && settings.cloudflareApiToken);
  if (type === 'cloudflare' && !hasCloudflareConfig) {
    logger.warn('STORAGE_TYPE is cloudflare but credentials are missing. Falling back to local storage.');
    type = 'local';
  }

  return {
    type,
    uploadDir: settings.uploadDir,
    cloudflare:
      type === 'cloudflare'
        ? { accountId: settings.cloudflareAccountId, apiToken: settings.cloudflareApiToken }
        : null,
  };
};
