import { z } from 'zod';
import { toContact } from '../../connections/db/models/contact.model';
import type { Contact, CreateContactInput, UpdateContactInput } from '../../connections/db/models/contact.model';
import type { PaginationQuery, SearchQuery } from '../../types/request.types';
import type { PaginatedResult } from '../../types/response.types';
import type { CacheService } from '../../utils/cache.service';
import { cacheKeys } from '../../utils/cache.service';
import { NotFoundError } from '../../utils/errors';
import { birthdayWindowKeys, daysUntilBirthday } from './birthdays';
import type { ContactRepository } from './contacts.repository';

const contactSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone: z.string().nullable(),
  birth_date: z.string(),
  notes: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const contactPageSchema = z.object({
  items: z.array(contactSchema),
  total: z.number().int(),
});

export type UpcomingBirthday = Contact & { days_until_birthday: number };

export interface ContactsServiceDeps {
  contacts: ContactRepository;
  cache: CacheService;
  listTtlSeconds: number;
  now?: () => Date;
}

export class ContactsService {
  private readonly contacts: ContactRepository;
  private readonly cache: CacheService;
  private readonly listTtlSeconds: number;
  private readonly now: () => Date;

  constructor(deps: ContactsServiceDeps) {
    this.contacts = deps.contacts;
    this.cache = deps.cache;
    this.listTtlSeconds = deps.listTtlSeconds;
    this.now = deps.now ?? (() => new Date());
  }

  async create(userId: string, input: CreateContactInput): Promise<Contact> {
    const row = await this.contacts.create(userId, input);
    await this.invalidateLists(userId);
    return toContact(row);
  }

  async get(userId: string, id: string): Promise<Contact> {
    const row = await this.contacts.findById(userId, id);
    if (!row) {
      throw new NotFoundError('Contact not found');
    }
    return toContact(row);
  }

  async update(userId: string, id: string, input: UpdateContactInput): Promise<Contact> {
    const row = await this.contacts.update(userId, id, input);
    if (!row) {
      throw new NotFoundError('Contact not found');
    }
    await this.invalidateLists(userId);
    return toContact(row);
  }

  async delete(userId: string, id: string): Promise<void> {
    const deleted = await this.contacts.delete(userId, id);
    if (!deleted) {
      throw new NotFoundError('Contact not found');
    }
    await this.invalidateLists(userId);
  }

  /**
   * Pages are cached under the owner's current generation; a write bumps it
   */
  async list(userId: string, query: PaginationQuery): Promise<PaginatedResult<Contact>> {
    const generation = await this.cache.getGeneration(cacheKeys.contactsGeneration(userId));
    const key =
      generation === null ? null : cacheKeys.contactsPage(userId, generation, query.page, query.limit);

    if (key) {
      const cached = await this.cache.get(key, contactPageSchema);
      if (cached) return cached;
    }

    const page = await this.contacts.list(userId, query);
    const result = { items: page.items.map(toContact), total: page.total };

    if (key) {
      await this.cache.set(key, result, this.listTtlSeconds);
    }
    return result;
  }

  async search(userId: string, query: SearchQuery): Promise<PaginatedResult<Contact>> {
    const page = await this.contacts.search(userId, query);
    return { items: page.items.map(toContact), total: page.total };
  }

  /**
   * Contacts with a birthday in the next 7 days (today included), soonest first
   */
  async upcomingBirthdays(userId: string): Promise<UpcomingBirthday[]> {
    const today = this.now();
    const rows = await this.contacts.findByBirthdayKeys(userId, birthdayWindowKeys(today));

    return rows
      .map(row => ({ ...toContact(row), days_until_birthday: daysUntilBirthday(row.birth_date, today) }))
      .sort((a, b) => a.days_until_birthday - b.days_until_birthday);
  }

  private invalidateLists(userId: string): Promise<void> {
    return this.cache.bumpGeneration(cacheKeys.contactsGeneration(userId));
  }
}
