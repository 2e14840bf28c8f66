import type { Response, NextFunction } from 'express';
import multer from 'multer';
import { storageConfig } from '../../connections/config/app.config';
import { requireUser } from '../../middlewares/auth.middleware';
import type { AuthRequest } from '../../types/request.types';
import { ValidationError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';
import { toUserResponse } from '../auth/auth.mappers';
import { ALLOWED_IMAGE_TYPES } from '../upload/storage.service';
import type { UsersService } from './users.service';

// Avatars are buffered in memory and handed to the storage backend
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: storageConfig.maxAvatarSize,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (ALLOWED_IMAGE_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new ValidationError(`File type ${file.mimetype} is not supported`));
    }
  },
});

export const avatarUploadMiddleware = upload.single('file');

export const createUsersController = (usersService: UsersService) => ({
  getMe: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      return ResponseHandler.success(res, toUserResponse(user));
    } catch (error) {
      next(error);
    }
  },

  updateAvatar: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      if (!req.file) {
        throw new ValidationError('No file provided');
      }

      const { buffer, originalname, mimetype } = req.file;
      const updated = await usersService.updateAvatar(user.id, {
        buffer,
        fileName: originalname,
        mimeType: mimetype,
      });
      return ResponseHandler.success(res, updated, 'Avatar updated');
    } catch (error) {
      next(error);
    }
  },
});

export type UsersController = ReturnType<typeof createUsersController>;
