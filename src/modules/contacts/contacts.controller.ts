import type { Response, NextFunction } from 'express';
import { requireUser } from '../../middlewares/auth.middleware';
import type { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema, paginationSchema, searchQuerySchema } from '../../utils/validation';
import type { ContactsService } from './contacts.service';
import { createContactSchema, updateContactSchema } from './contacts.validation';

export const createContactsController = (contactsService: ContactsService) => ({
  getContacts: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const query = paginationSchema.parse(req.query);
      const page = await contactsService.list(user.id, query);
      return ResponseHandler.paginated(res, page.items, { ...query, total: page.total });
    } catch (error) {
      next(error);
    }
  },

  searchContacts: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const query = searchQuerySchema.parse(req.query);
      const page = await contactsService.search(user.id, query);
      return ResponseHandler.paginated(res, page.items, { page: query.page, limit: query.limit, total: page.total });
    } catch (error) {
      next(error);
    }
  },

  getUpcomingBirthdays: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const contacts = await contactsService.upcomingBirthdays(user.id);
      return ResponseHandler.success(res, contacts);
    } catch (error) {
      next(error);
    }
  },

  getContactById: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const { id } = idParamSchema.parse(req.params);
      const contact = await contactsService.get(user.id, id);
      return ResponseHandler.success(res, contact);
    } catch (error) {
      next(error);
    }
  },

  createContact: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const input = createContactSchema.parse(req.body);
      const contact = await contactsService.create(user.id, input);
      return ResponseHandler.created(res, contact, 'Contact created');
    } catch (error) {
      next(error);
    }
  },

  updateContact: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const { id } = idParamSchema.parse(req.params);
      const input = updateContactSchema.parse(req.body);
      const contact = await contactsService.update(user.id, id, input);
      return ResponseHandler.success(res, contact, 'Contact updated');
    } catch (error) {
      next(error);
    }
  },

  deleteContact: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const { id } = idParamSchema.parse(req.params);
      await contactsService.delete(user.id, id);
      return ResponseHandler.success(res, null, 'Contact deleted');
    } catch (error) {
      next(error);
    }
  },
});

export type ContactsController = ReturnType<typeof createContactsController>;
