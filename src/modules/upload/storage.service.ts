/**
 * Avatar storage: picks the backend from the storage config
 */

import { appConfig } from '../../connections/config/app.config';
import { CloudflareImagesStorage } from './cloudflare.service';
import { LocalAvatarStorage } from './localStorage.service';
import { getStorageConfig } from './storage.config';
import type { ResolvedStorageConfig } from './storage.config';

export const ALLOWED_IMAGE_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/gif', 'image/webp'];

export interface UploadedImage {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
}

export interface AvatarStorage {
  /** Stores the image and returns its public URL */
  upload(file: UploadedImage, ownerId: string): Promise<string>;
}

export const createAvatarStorage = (config: ResolvedStorageConfig = getStorageConfig()): AvatarStorage => {
  if (config.type === 'cloudflare' && config.cloudflare) {
    return new CloudflareImagesStorage(config.cloudflare);
  }
  return new LocalAvatarStorage(config.uploadDir, appConfig.baseUrl);
};
