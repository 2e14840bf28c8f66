import type { UserRepository } from '../auth/auth.repository';
import { toAuthUser, toUserResponse } from '../auth/auth.mappers';
import type { AvatarStorage, UploadedImage } from '../upload/storage.service';
import type { UserResponse } from '../../types/response.types';
import type { CacheService } from '../../utils/cache.service';
import { cacheKeys } from '../../utils/cache.service';
import { NotFoundError, UpstreamUnavailableError } from '../../utils/errors';
import { logger, errorMessage } from '../../utils/logging';

export class UsersService {
  constructor(
    private readonly users: UserRepository,
    private readonly storage: AvatarStorage,
    private readonly cache: CacheService
  ) {}

  async updateAvatar(userId: string, file: UploadedImage): Promise<UserResponse> {
    let avatarUrl: string;
    try {
      avatarUrl = await this.storage.upload(file, userId);
    } catch (error) {
      logger.error('[Users] Avatar upload failed', { userId, error: errorMessage(error) });
      throw new UpstreamUnavailableError('Image storage', 502);
    }

    const user = await this.users.updateAvatar(userId, avatarUrl);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    await this.cache.bumpGeneration(cacheKeys.userGeneration(userId));
    return toUserResponse(toAuthUser(user));
  }
}
