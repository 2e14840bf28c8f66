/**
 * Cloudflare Images upload
 */

import { z } from 'zod';
import { logger } from '../../utils/logging';
import type { AvatarStorage, UploadedImage } from './storage.service';

const cloudflareUploadResponseSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      id: z.string(),
      filename: z.string().optional(),
      variants: z.array(z.string()),
    })
    .nullish(),
  errors: z.array(z.object({ code: z.number().optional(), message: z.string() })).optional(),
});

export interface CloudflareCredentials {
  accountId: string;
  apiToken: string;
}

export class CloudflareImagesStorage implements AvatarStorage {
  private readonly imagesApiUrl: string;

  constructor(
    private readonly credentials: CloudflareCredentials,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.imagesApiUrl = `https://api.cloudflare.com/client/v4/accounts/${credentials.accountId}/images/v1`;
  }

  async upload(file: UploadedImage, ownerId: string): Promise<string> {
    const formData = new FormData();
    formData.append('file', new Blob([file.buffer], { type: file.mimeType }), file.fileName);
    formData.append('metadata', JSON.stringify({ ownerId, kind: 'avatar' }));

    const response = await this.fetchImpl(this.imagesApiUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.credentials.apiToken}`,
      },
      body: formData,
    });

    const parsed = cloudflareUploadResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Cloudflare response (status ${response.status})`);
    }

    const data = parsed.data;
    if (!response.ok || !data.success) {
      throw new Error(data.errors?.[0]?.message ?? `Upload failed with status ${response.status}`);
    }

    const imageUrl = data.result?.variants[0];
    if (!imageUrl) {
      throw new Error('Upload succeeded but no image URL returned');
    }

    logger.info('Avatar uploaded to Cloudflare', { ownerId, imageId: data.result?.id });
    return imageUrl;
  }
}
