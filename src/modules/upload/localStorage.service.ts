/**
 * Local storage: writes avatars under `{uploadDir}/avatars`, served at `/uploads`
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { AvatarStorage, UploadedImage } from './storage.service';

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

export class LocalAvatarStorage implements AvatarStorage {
  constructor(
    private readonly uploadDir: string,
    private readonly baseUrl: string
  ) {}

  async upload(file: UploadedImage, _ownerId: string): Promise<string> {
    const targetDir = path.join(this.uploadDir, 'avatars');
    await mkdir(targetDir, { recursive: true });

    const ext = EXTENSIONS[file.mimeType] ?? path.extname(file.fileName);
    const fileName = `${uuidv4()}${ext}`;
    await writeFile(path.join(targetDir, fileName), file.buffer);

    return `${this.baseUrl}/uploads/avatars/${fileName}`;
  }
}
