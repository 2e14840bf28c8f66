import express from 'express';
import type { RequestHandler } from 'express';
import type { RateLimitFactory } from '../../middlewares/rateLimit.middleware';
import { rateLimitPolicies } from '../../middlewares/rateLimit.middleware';
import type { ContactsController } from './contacts.controller';

export const createContactsRouter = (
  contactsController: ContactsController,
  authenticate: RequestHandler,
  rateLimit: RateLimitFactory
) => {
  const router = express.Router();

  // Every contact route is owner-scoped
  router.use(authenticate);

  router.get('/', rateLimit(rateLimitPolicies.contactsList), contactsController.getContacts);
  router.post('/', rateLimit(rateLimitPolicies.contactsCreate), contactsController.createContact);
  router.get('/search', rateLimit(rateLimitPolicies.contactsSearch), contactsController.searchContacts);
  router.get('/birthdays', rateLimit(rateLimitPolicies.contactsBirthdays), contactsController.getUpcomingBirthdays);
  router.get('/:id', rateLimit(rateLimitPolicies.contactsGet), contactsController.getContactById);
  router.put('/:id', rateLimit(rateLimitPolicies.contactsUpdate), contactsController.updateContact);
  router.delete('/:id', rateLimit(rateLimitPolicies.contactsDelete), contactsController.deleteContact);

  return router;
};
